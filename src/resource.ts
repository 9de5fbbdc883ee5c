import * as S from '@effect/schema/Schema'
import * as TreeFormatter from '@effect/schema/TreeFormatter'
import * as Either from 'effect/Either'

import { RECONCILE_REQUEST_ANNOTATION } from './condition-types'
import { type Condition, normalizeConditions, type StatusResource } from './conditions'
import { InvalidResourceError } from './errors'
import { asNumber, asRecord, asString } from './records'

const KubernetesObjectSchema = S.Struct({
  apiVersion: S.NonEmptyString,
  kind: S.NonEmptyString,
  metadata: S.Struct({
    name: S.NonEmptyString,
    namespace: S.optional(S.String),
    generation: S.optional(S.Number),
    annotations: S.optional(S.Record({ key: S.String, value: S.String })),
  }),
  status: S.optional(S.Record({ key: S.String, value: S.Unknown })),
})

export type ObjectResource = StatusResource & {
  apiVersion: string
  kind: string
  name: string
  namespace: string | null
  getStatusObservedGeneration: () => number | null
  setStatusObservedGeneration: (generation: number) => void
  getInitialStatus: () => Record<string, unknown>
  toObject: () => Record<string, unknown>
}

/**
 * Wraps an unstructured Kubernetes object (as returned by the API server) in
 * the condition capability. Fields other than status conditions,
 * observedGeneration and lastHandledReconcileAt pass through untouched.
 */
export const createObjectResource = (raw: unknown): ObjectResource => {
  const decoded = S.decodeUnknownEither(KubernetesObjectSchema)(raw)
  if (Either.isLeft(decoded)) {
    throw new InvalidResourceError(`invalid resource: ${TreeFormatter.formatErrorSync(decoded.left)}`)
  }
  const { apiVersion, kind, metadata } = decoded.right
  const source = asRecord(raw) ?? {}
  const initialStatus: Record<string, unknown> = { ...decoded.right.status }
  const status: Record<string, unknown> = { ...initialStatus }

  let conditions: Condition[] = normalizeConditions(status.conditions)
  let observedGeneration = asNumber(status.observedGeneration)
  let lastHandledReconcileAt = asString(status.lastHandledReconcileAt)

  const getStatus = () => {
    const next: Record<string, unknown> = { ...status, conditions: conditions.map((condition) => ({ ...condition })) }
    if (observedGeneration !== null) next.observedGeneration = observedGeneration
    if (lastHandledReconcileAt !== null) next.lastHandledReconcileAt = lastHandledReconcileAt
    return next
  }

  return {
    apiVersion,
    kind,
    name: metadata.name,
    namespace: metadata.namespace?.trim() || null,
    getGeneration: () => metadata.generation ?? 0,
    getConditions: () => conditions,
    setConditions: (next) => {
      conditions = [...next]
    },
    getReconcileRequest: () => asString(metadata.annotations?.[RECONCILE_REQUEST_ANNOTATION]),
    getLastHandledReconcileAt: () => lastHandledReconcileAt,
    setLastHandledReconcileAt: (value) => {
      lastHandledReconcileAt = value
    },
    getStatusObservedGeneration: () => observedGeneration,
    setStatusObservedGeneration: (generation) => {
      observedGeneration = generation
    },
    getInitialStatus: () => initialStatus,
    toObject: () => ({ ...source, status: getStatus() }),
  }
}
