import { type ConditionGetter, isReady, isStalled } from './conditions'

export type PatchOption =
  | { kind: 'fieldOwner'; fieldOwner: string }
  | { kind: 'ownedConditions'; conditions: readonly string[] }
  | { kind: 'includeStatusObservedGeneration' }

export type PatchHelperOptions = {
  fieldOwner: string
  ownedConditions: string[]
  includeStatusObservedGeneration: boolean
}

export const withFieldOwner = (fieldOwner: string): PatchOption => ({ kind: 'fieldOwner', fieldOwner })

export const withOwnedConditions = (conditions: readonly string[]): PatchOption => ({
  kind: 'ownedConditions',
  conditions,
})

export const withStatusObservedGeneration = (): PatchOption => ({ kind: 'includeStatusObservedGeneration' })

/**
 * The last non-empty field owner wins; owned conditions accumulate without
 * duplicates.
 */
export const resolvePatchOptions = (options: readonly PatchOption[]): PatchHelperOptions => {
  const resolved: PatchHelperOptions = { fieldOwner: '', ownedConditions: [], includeStatusObservedGeneration: false }
  for (const option of options) {
    switch (option.kind) {
      case 'fieldOwner':
        if (option.fieldOwner) resolved.fieldOwner = option.fieldOwner
        break
      case 'ownedConditions':
        for (const type of option.conditions) {
          if (!resolved.ownedConditions.includes(type)) resolved.ownedConditions.push(type)
        }
        break
      case 'includeStatusObservedGeneration':
        resolved.includeStatusObservedGeneration = true
        break
    }
  }
  return resolved
}

/**
 * Appends the options a status patch needs. Observed generation is only
 * published for terminal states (Stalled=True or Ready=True); an in-progress
 * status must not claim the generation it is still working on.
 */
export const addPatchOptions = (
  obj: ConditionGetter,
  options: readonly PatchOption[],
  ownedConditions: readonly string[],
  fieldOwner: string,
): PatchOption[] => {
  const next = [...options, withOwnedConditions(ownedConditions), withFieldOwner(fieldOwner)]
  if (isStalled(obj) || isReady(obj)) {
    next.push(withStatusObservedGeneration())
  }
  return next
}
