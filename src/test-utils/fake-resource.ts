import { RECONCILE_REQUEST_ANNOTATION } from '../condition-types'
import { type ConditionGetter, type ConditionUpdate, toConditionUpdate } from '../conditions'
import { createObjectResource } from '../resource'

type FakeResourceOptions = {
  generation?: number
  statusObservedGeneration?: number
  reconcileRequest?: string
  status?: Record<string, unknown>
}

export const createFakeResource = (options: FakeResourceOptions = {}) => {
  const annotations: Record<string, string> = {}
  if (options.reconcileRequest) annotations[RECONCILE_REQUEST_ANNOTATION] = options.reconcileRequest
  const status: Record<string, unknown> = { ...options.status }
  if (options.statusObservedGeneration !== undefined) status.observedGeneration = options.statusObservedGeneration
  return createObjectResource({
    apiVersion: 'example.io/v1',
    kind: 'Fake',
    metadata: {
      name: 'fake',
      namespace: 'default',
      generation: options.generation ?? 1,
      annotations,
    },
    spec: { interval: '1m' },
    status,
  })
}

const byType = (a: ConditionUpdate, b: ConditionUpdate) => a.type.localeCompare(b.type)

/** Conditions without volatile fields, ordered by type for comparison. */
export const conditionStates = (obj: ConditionGetter) => obj.getConditions().map(toConditionUpdate).sort(byType)

export const sortStates = (states: ConditionUpdate[]) => [...states].sort(byType)
