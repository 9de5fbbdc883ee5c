import { format } from 'node:util'

import { READY_CONDITION, RECONCILING_CONDITION, STALLED_CONDITION } from './condition-types'
import { asNumber, asRecord, asString } from './records'

export type ConditionStatus = 'True' | 'False' | 'Unknown'

export type Condition = {
  type: string
  status: ConditionStatus
  reason: string
  message: string
  observedGeneration: number
  lastTransitionTime: string
}

/** The part of a condition a writer controls; generation and transition time are stamped on write. */
export type ConditionUpdate = Pick<Condition, 'type' | 'status' | 'reason' | 'message'>

export type ConditionGetter = {
  getConditions: () => Condition[]
}

/**
 * Capability every resource handled by the engine exposes. The engine never
 * touches a concrete resource type, only this view of it.
 */
export type ConditionSetter = ConditionGetter & {
  getGeneration: () => number
  setConditions: (conditions: Condition[]) => void
}

/** A condition setter that can also acknowledge out-of-band reconcile requests. */
export type StatusResource = ConditionSetter & {
  getReconcileRequest: () => string | null
  getLastHandledReconcileAt: () => string | null
  setLastHandledReconcileAt: (value: string) => void
}

const defaultNowIso = () => new Date().toISOString()

const normalizeConditionStatus = (status: string | null): ConditionStatus =>
  status === 'True' ? 'True' : status === 'False' ? 'False' : 'Unknown'

const asText = (value: unknown) => (typeof value === 'string' ? value : '')

const formatMessage = (messageFormat: string, args: unknown[]) =>
  args.length > 0 ? format(messageFormat, ...args) : messageFormat

export const normalizeConditions = (raw: unknown, nowIso: () => string = defaultNowIso): Condition[] => {
  if (!Array.isArray(raw)) return []
  const output: Condition[] = []
  const seen = new Set<string>()
  for (const item of raw) {
    const record = asRecord(item)
    if (!record) continue
    const type = asString(record.type)
    const status = asString(record.status)
    if (!type || !status || seen.has(type)) continue
    seen.add(type)
    output.push({
      type,
      status: normalizeConditionStatus(status),
      reason: asText(record.reason),
      message: asText(record.message),
      observedGeneration: asNumber(record.observedGeneration) ?? 0,
      lastTransitionTime: asString(record.lastTransitionTime) ?? nowIso(),
    })
  }
  return output
}

export const getCondition = (obj: ConditionGetter, type: string) =>
  obj.getConditions().find((condition) => condition.type === type)

export const hasCondition = (obj: ConditionGetter, type: string) => getCondition(obj, type) !== undefined

export const isTrue = (obj: ConditionGetter, type: string) => getCondition(obj, type)?.status === 'True'

export const isFalse = (obj: ConditionGetter, type: string) => getCondition(obj, type)?.status === 'False'

// A missing condition counts as Unknown.
export const isUnknown = (obj: ConditionGetter, type: string) => {
  const condition = getCondition(obj, type)
  return !condition || condition.status === 'Unknown'
}

export const isReady = (obj: ConditionGetter) => isTrue(obj, READY_CONDITION)

export const isStalled = (obj: ConditionGetter) => isTrue(obj, STALLED_CONDITION)

export const isReconciling = (obj: ConditionGetter) => isTrue(obj, RECONCILING_CONDITION)

/**
 * Upserts a condition by type. New types are appended, existing ones are
 * replaced in place. `lastTransitionTime` only moves when the status changes.
 */
export const setCondition = (obj: ConditionSetter, update: ConditionUpdate, nowIso: () => string = defaultNowIso) => {
  const next = [...obj.getConditions()]
  const observedGeneration = obj.getGeneration()
  const index = next.findIndex((condition) => condition.type === update.type)
  if (index === -1) {
    next.push({ ...update, observedGeneration, lastTransitionTime: nowIso() })
  } else {
    const existing = next[index]
    next[index] = {
      ...update,
      observedGeneration,
      lastTransitionTime: existing.status === update.status ? existing.lastTransitionTime : nowIso(),
    }
  }
  obj.setConditions(next)
}

export const deleteCondition = (obj: ConditionSetter, type: string) => {
  const current = obj.getConditions()
  if (!current.some((condition) => condition.type === type)) return
  obj.setConditions(current.filter((condition) => condition.type !== type))
}

export const trueCondition = (type: string, reason: string, messageFormat: string, ...args: unknown[]) =>
  ({ type, status: 'True', reason, message: formatMessage(messageFormat, args) }) satisfies ConditionUpdate

export const falseCondition = (type: string, reason: string, messageFormat: string, ...args: unknown[]) =>
  ({ type, status: 'False', reason, message: formatMessage(messageFormat, args) }) satisfies ConditionUpdate

export const unknownCondition = (type: string, reason: string, messageFormat: string, ...args: unknown[]) =>
  ({ type, status: 'Unknown', reason, message: formatMessage(messageFormat, args) }) satisfies ConditionUpdate

export const markTrue = (obj: ConditionSetter, type: string, reason: string, messageFormat: string, ...args: unknown[]) =>
  setCondition(obj, trueCondition(type, reason, messageFormat, ...args))

export const markFalse = (obj: ConditionSetter, type: string, reason: string, messageFormat: string, ...args: unknown[]) =>
  setCondition(obj, falseCondition(type, reason, messageFormat, ...args))

export const markUnknown = (
  obj: ConditionSetter,
  type: string,
  reason: string,
  messageFormat: string,
  ...args: unknown[]
) => setCondition(obj, unknownCondition(type, reason, messageFormat, ...args))

/** Sets Reconciling=True and drops Stalled; the two never hold together. */
export const markReconciling = (obj: ConditionSetter, reason: string, messageFormat: string, ...args: unknown[]) => {
  deleteCondition(obj, STALLED_CONDITION)
  markTrue(obj, RECONCILING_CONDITION, reason, messageFormat, ...args)
}

/** Sets Stalled=True and drops Reconciling. */
export const markStalled = (obj: ConditionSetter, reason: string, messageFormat: string, ...args: unknown[]) => {
  deleteCondition(obj, RECONCILING_CONDITION)
  markTrue(obj, STALLED_CONDITION, reason, messageFormat, ...args)
}

export const toConditionUpdate = (condition: Condition): ConditionUpdate => ({
  type: condition.type,
  status: condition.status,
  reason: condition.reason,
  message: condition.message,
})
