import { beforeEach, describe, expect, it, vi } from 'vitest'

const patchNamespacedCustomObjectStatus = vi.fn()
const patchClusterCustomObjectStatus = vi.fn()
const loadFromDefault = vi.fn()
const makeApiClient = vi.fn()
const setHeaderOptions = vi.fn((key: string, value: string) => ({ key, value }))

vi.mock('@kubernetes/client-node', () => {
  class KubeConfig {
    loadFromDefault = loadFromDefault
    makeApiClient = makeApiClient
  }

  class CustomObjectsApi {}

  return {
    CustomObjectsApi,
    KubeConfig,
    PatchStrategy: { ServerSideApply: 'application/apply-patch+yaml' },
    setHeaderOptions,
  }
})

const request = {
  group: 'source.example.io',
  version: 'v1',
  plural: 'buckets',
  namespace: 'team-a',
  name: 'assets',
  fieldManager: 'bucket-controller',
  body: { apiVersion: 'source.example.io/v1', kind: 'Bucket', status: { conditions: [] } },
}

describe('kube status client', () => {
  beforeEach(() => {
    vi.resetModules()
    patchNamespacedCustomObjectStatus.mockReset()
    patchClusterCustomObjectStatus.mockReset()
    loadFromDefault.mockReset()
    makeApiClient.mockReset()
    makeApiClient.mockReturnValue({ patchNamespacedCustomObjectStatus, patchClusterCustomObjectStatus })
  })

  it('patches namespaced status with server-side apply', async () => {
    patchNamespacedCustomObjectStatus.mockResolvedValue({ kind: 'Bucket' })
    const { createKubeStatusClient } = await import('../kube-status-client')

    const client = createKubeStatusClient()
    const response = await client.patchStatus(request)
    await client.patchStatus(request)

    expect(response).toEqual({ kind: 'Bucket' })
    expect(loadFromDefault).toHaveBeenCalledTimes(1)
    expect(makeApiClient).toHaveBeenCalledTimes(1)
    expect(patchNamespacedCustomObjectStatus).toHaveBeenCalledWith(
      {
        group: 'source.example.io',
        version: 'v1',
        namespace: 'team-a',
        plural: 'buckets',
        name: 'assets',
        body: request.body,
        fieldManager: 'bucket-controller',
        force: true,
      },
      { key: 'Content-Type', value: 'application/apply-patch+yaml' },
    )
    expect(patchClusterCustomObjectStatus).not.toHaveBeenCalled()
  })

  it('patches cluster scoped status and leaves an empty field manager unset', async () => {
    patchClusterCustomObjectStatus.mockResolvedValue(undefined)
    const { createKubeStatusClient } = await import('../kube-status-client')

    const response = await createKubeStatusClient().patchStatus({ ...request, namespace: null, fieldManager: '' })

    expect(response).toEqual({})
    expect(patchClusterCustomObjectStatus).toHaveBeenCalledTimes(1)
    const [params] = patchClusterCustomObjectStatus.mock.calls[0]
    expect(params).toEqual({
      group: 'source.example.io',
      version: 'v1',
      plural: 'buckets',
      name: 'assets',
      body: request.body,
      fieldManager: undefined,
      force: true,
    })
    expect(patchNamespacedCustomObjectStatus).not.toHaveBeenCalled()
  })

  it('uses a provided kube config without loading the default one', async () => {
    patchNamespacedCustomObjectStatus.mockResolvedValue({})
    const { KubeConfig } = await import('@kubernetes/client-node')
    const { createKubeStatusClient } = await import('../kube-status-client')

    await createKubeStatusClient(new KubeConfig()).patchStatus(request)

    expect(loadFromDefault).not.toHaveBeenCalled()
    expect(makeApiClient).toHaveBeenCalledTimes(1)
  })

  it('propagates api errors', async () => {
    patchNamespacedCustomObjectStatus.mockRejectedValue(new Error('forbidden'))
    const { createKubeStatusClient } = await import('../kube-status-client')

    await expect(createKubeStatusClient().patchStatus(request)).rejects.toThrow('forbidden')
  })
})
