import { READY_CONDITION, RECONCILING_CONDITION, STALLED_CONDITION } from './condition-types'
import { type ConditionGetter, getCondition, isReady, isStalled, isTrue } from './conditions'

export type ConformanceViolation = {
  rule: 'StalledAndReconciling' | 'ReadyWithNegativeCondition' | 'MissingReady' | 'StaleObservedGeneration'
  message: string
}

export type CheckableResource = ConditionGetter & {
  getGeneration: () => number
  getStatusObservedGeneration: () => number | null
}

export type ConformanceOptions = {
  negativePolarity?: readonly string[]
}

/** Reports status combinations a consumer of Ready/Stalled/Reconciling cannot interpret. */
export const checkStatusConformance = (
  obj: CheckableResource,
  options: ConformanceOptions = {},
): ConformanceViolation[] => {
  const violations: ConformanceViolation[] = []

  if (isStalled(obj) && isTrue(obj, RECONCILING_CONDITION)) {
    violations.push({
      rule: 'StalledAndReconciling',
      message: `${STALLED_CONDITION} and ${RECONCILING_CONDITION} are both True`,
    })
  }

  if (isReady(obj)) {
    const negative = (options.negativePolarity ?? []).filter(
      (type) => type !== READY_CONDITION && isTrue(obj, type),
    )
    if (negative.length > 0) {
      violations.push({
        rule: 'ReadyWithNegativeCondition',
        message: `${READY_CONDITION}=True with negative polarity conditions True: ${negative.join(', ')}`,
      })
    }
  }

  if (isStalled(obj) && !getCondition(obj, READY_CONDITION)) {
    violations.push({ rule: 'MissingReady', message: `${STALLED_CONDITION}=True without a ${READY_CONDITION} condition` })
  }

  if (isReady(obj) || isStalled(obj)) {
    const observed = obj.getStatusObservedGeneration()
    const generation = obj.getGeneration()
    if (observed !== generation) {
      violations.push({
        rule: 'StaleObservedGeneration',
        message: `status.observedGeneration ${observed ?? 'unset'} does not match generation ${generation}`,
      })
    }
  }

  return violations
}
