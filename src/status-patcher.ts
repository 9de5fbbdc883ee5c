import { Context, Effect, Layer, pipe } from 'effect'

import { resolveStatusEngineConfig, type StatusEngineConfig } from './config'
import { StatusPatchError } from './errors'
import { createKubeStatusClient } from './kube-status-client'
import { createConsoleLogger, type StatusLogger } from './logger'
import { type PatchOption, resolvePatchOptions, withFieldOwner, withOwnedConditions } from './patch-options'
import { asNumber } from './records'
import type { ObjectResource } from './resource'
import { shouldApplyStatus } from './status-utils'

export type StatusPatchRequest = {
  group: string
  version: string
  plural: string
  namespace: string | null
  name: string
  fieldManager: string
  body: Record<string, unknown>
}

export type StatusClient = {
  patchStatus: (request: StatusPatchRequest) => Promise<Record<string, unknown>>
}

export type StatusPatch = {
  fieldManager: string
  ownedConditions: string[]
  body: Record<string, unknown> & { status: Record<string, unknown> }
}

export type StatusPatchResult = {
  applied: boolean
  object: Record<string, unknown> | null
}

export type StatusPatcherService = {
  patchStatus: (
    resource: ObjectResource,
    plural: string,
    options: readonly PatchOption[],
  ) => Effect.Effect<StatusPatchResult, StatusPatchError>
}

export class StatusPatcher extends Context.Tag('StatusPatcher')<StatusPatcher, StatusPatcherService>() {}

const splitApiVersion = (apiVersion: string) => {
  const index = apiVersion.indexOf('/')
  if (index === -1) return { group: '', version: apiVersion }
  return { group: apiVersion.slice(0, index), version: apiVersion.slice(index + 1) }
}

/**
 * Builds a server-side apply body for the status subresource. Conditions are
 * limited to the owned types when any are given, so the field manager only
 * claims the entries it writes.
 */
export const buildStatusPatch = (resource: ObjectResource, options: readonly PatchOption[]): StatusPatch => {
  const resolved = resolvePatchOptions(options)
  const owned = resolved.ownedConditions
  const conditions =
    owned.length > 0
      ? resource.getConditions().filter((condition) => owned.includes(condition.type))
      : resource.getConditions()

  const status: Record<string, unknown> = { conditions: conditions.map((condition) => ({ ...condition })) }
  const lastHandledReconcileAt = resource.getLastHandledReconcileAt()
  if (lastHandledReconcileAt) status.lastHandledReconcileAt = lastHandledReconcileAt
  if (resolved.includeStatusObservedGeneration) status.observedGeneration = resource.getGeneration()

  const metadata: Record<string, unknown> = { name: resource.name }
  if (resource.namespace) metadata.namespace = resource.namespace

  return {
    fieldManager: resolved.fieldOwner,
    ownedConditions: owned,
    body: { apiVersion: resource.apiVersion, kind: resource.kind, metadata, status },
  }
}

/**
 * `defaults` are applied before the options of each call, so a call's own
 * field owner and owned conditions extend or replace them.
 */
export const makeStatusPatcher = (
  client: StatusClient,
  logger: StatusLogger,
  defaults: readonly PatchOption[] = [],
): StatusPatcherService => ({
  patchStatus: (resource, plural, options) =>
    pipe(
      Effect.sync(() => buildStatusPatch(resource, [...defaults, ...options])),
      Effect.flatMap((patch) => {
        if (!shouldApplyStatus(resource.getInitialStatus(), patch.body.status, patch.ownedConditions)) {
          logger.debug('status unchanged, skipping patch', { kind: resource.kind, name: resource.name })
          return Effect.succeed<StatusPatchResult>({ applied: false, object: null })
        }
        const { group, version } = splitApiVersion(resource.apiVersion)
        return pipe(
          Effect.tryPromise({
            try: () =>
              client.patchStatus({
                group,
                version,
                plural,
                namespace: resource.namespace,
                name: resource.name,
                fieldManager: patch.fieldManager,
                body: patch.body,
              }),
            catch: (error) =>
              new StatusPatchError(
                `patch ${resource.kind} ${resource.namespace ?? ''}/${resource.name} status failed: ${
                  error instanceof Error ? error.message : String(error)
                }`,
                { cause: error },
              ),
          }),
          Effect.map((object): StatusPatchResult => {
            const observedGeneration = asNumber(patch.body.status.observedGeneration)
            if (observedGeneration !== null) resource.setStatusObservedGeneration(observedGeneration)
            return { applied: true, object }
          }),
        )
      }),
    ),
})

export const makeConfiguredStatusPatcher = (client: StatusClient, config: StatusEngineConfig) =>
  makeStatusPatcher(client, createConsoleLogger({ debug: config.debug }), [
    withOwnedConditions(config.ownedConditions),
    withFieldOwner(config.fieldOwner),
  ])

export const StatusPatcherLive = Layer.sync(StatusPatcher, () =>
  makeConfiguredStatusPatcher(createKubeStatusClient(), resolveStatusEngineConfig()),
)
