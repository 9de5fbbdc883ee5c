import { normalizeConditions } from './conditions'
import { asRecord } from './records'

const byType = (a: { type: string }, b: { type: string }) => a.type.localeCompare(b.type)

const comparableConditions = (raw: unknown, ownedConditions: readonly string[]) =>
  normalizeConditions(raw, () => '')
    .filter((condition) => ownedConditions.length === 0 || ownedConditions.includes(condition.type))
    .map(({ type, status, reason, message, observedGeneration }) => ({
      type,
      status,
      reason,
      message,
      observedGeneration,
    }))
    .sort(byType)

/** JSON with object keys sorted at every depth; undefined members are dropped. */
export const stableStringify = (value: unknown): string =>
  JSON.stringify(value, (_key, entry: unknown) => {
    const record = asRecord(entry)
    if (!record) return entry
    return Object.fromEntries(
      Object.keys(record)
        .sort()
        .map((key): [string, unknown] => [key, record[key]]),
    )
  })

/**
 * Drops transition timestamps and condition ordering, and limits conditions
 * to `ownedConditions` when that list is non-empty.
 */
export const normalizeStatusForCompare = (
  status: Record<string, unknown> | null | undefined,
  ownedConditions: readonly string[] = [],
) => {
  const next: Record<string, unknown> = { ...asRecord(status) }
  const conditions = comparableConditions(next.conditions, ownedConditions)
  if (conditions.length > 0) {
    next.conditions = conditions
  } else {
    delete next.conditions
  }
  return next
}

/**
 * True when writing `nextStatus` would change the stored status. Only the
 * fields `nextStatus` carries are compared; everything else belongs to other
 * writers.
 */
export const shouldApplyStatus = (
  currentStatus: Record<string, unknown> | null | undefined,
  nextStatus: Record<string, unknown>,
  ownedConditions: readonly string[] = [],
) => {
  const current = asRecord(currentStatus) ?? {}
  const projected: Record<string, unknown> = {}
  for (const key of Object.keys(nextStatus)) {
    if (key in current) projected[key] = current[key]
  }
  return (
    stableStringify(normalizeStatusForCompare(projected, ownedConditions)) !==
    stableStringify(normalizeStatusForCompare(nextStatus, ownedConditions))
  )
}
