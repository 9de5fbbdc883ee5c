import { CustomObjectsApi, KubeConfig, PatchStrategy, setHeaderOptions } from '@kubernetes/client-node'

import { asRecord } from './records'
import type { StatusClient } from './status-patcher'

/**
 * Status client backed by the cluster API. Patches go to the status
 * subresource as server-side apply with `force`, so the configured field
 * manager takes ownership of the fields it writes.
 */
export const createKubeStatusClient = (kubeConfig?: KubeConfig): StatusClient => {
  let api: CustomObjectsApi | null = null

  const resolveApi = () => {
    if (api) return api
    let config = kubeConfig
    if (!config) {
      config = new KubeConfig()
      config.loadFromDefault()
    }
    api = config.makeApiClient(CustomObjectsApi)
    return api
  }

  return {
    patchStatus: async (request) => {
      const client = resolveApi()
      const headers = setHeaderOptions('Content-Type', PatchStrategy.ServerSideApply)
      const response: unknown = request.namespace
        ? await client.patchNamespacedCustomObjectStatus(
            {
              group: request.group,
              version: request.version,
              namespace: request.namespace,
              plural: request.plural,
              name: request.name,
              body: request.body,
              fieldManager: request.fieldManager || undefined,
              force: true,
            },
            headers,
          )
        : await client.patchClusterCustomObjectStatus(
            {
              group: request.group,
              version: request.version,
              plural: request.plural,
              name: request.name,
              body: request.body,
              fieldManager: request.fieldManager || undefined,
              force: true,
            },
            headers,
          )
      return asRecord(response) ?? {}
    },
  }
}
