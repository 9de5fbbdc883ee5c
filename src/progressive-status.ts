import { READY_CONDITION } from './condition-types'
import { type ConditionSetter, getCondition, markReconciling, setCondition, unknownCondition } from './conditions'

/**
 * Marks a resource as in progress before the reconcile outcome is known.
 * Ready only moves to Unknown when it is unset or already Unknown, or when
 * `drift` says the last known-good state no longer holds.
 */
export const progressiveStatus = (
  drift: boolean,
  obj: ConditionSetter,
  reason: string,
  messageFormat: string,
  ...args: unknown[]
) => {
  markReconciling(obj, reason, messageFormat, ...args)

  const ready = getCondition(obj, READY_CONDITION)
  if (!ready || ready.status === 'Unknown' || (ready.status === 'True' && drift)) {
    setCondition(obj, unknownCondition(READY_CONDITION, reason, messageFormat, ...args))
  }
}
