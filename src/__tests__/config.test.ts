import { afterEach, describe, expect, it, vi } from 'vitest'

import { resolveStatusEngineConfig } from '~/config'

afterEach(() => {
  vi.restoreAllMocks()
})

describe('resolveStatusEngineConfig', () => {
  it('uses defaults when nothing is set', () => {
    expect(resolveStatusEngineConfig({})).toEqual({
      fieldOwner: 'status-controller',
      successMessage: 'Reconciliation succeeded',
      requeueIntervalMs: 600_000,
      ownedConditions: ['Ready', 'Reconciling', 'Stalled'],
      debug: false,
    })
  })

  it('reads overrides from the environment', () => {
    const config = resolveStatusEngineConfig({
      STATUS_ENGINE_FIELD_OWNER: 'bucket-controller',
      STATUS_ENGINE_SUCCESS_MESSAGE: 'stored artifact',
      STATUS_ENGINE_REQUEUE_INTERVAL_SECONDS: '30',
      STATUS_ENGINE_OWNED_CONDITIONS: 'Ready, Stalled, ArtifactInStorage',
      STATUS_ENGINE_DEBUG: 'true',
    })

    expect(config).toEqual({
      fieldOwner: 'bucket-controller',
      successMessage: 'stored artifact',
      requeueIntervalMs: 30_000,
      ownedConditions: ['Ready', 'Stalled', 'ArtifactInStorage'],
      debug: true,
    })
  })

  it('warns and falls back on an invalid interval', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {})

    const config = resolveStatusEngineConfig({ STATUS_ENGINE_REQUEUE_INTERVAL_SECONDS: '0' })

    expect(config.requeueIntervalMs).toBe(600_000)
    expect(warnSpy).toHaveBeenCalledWith(
      '[status] STATUS_ENGINE_REQUEUE_INTERVAL_SECONDS must be an integer >= 1 (got "0"); using 600',
    )
  })

  it('keeps the default owned conditions when the list is empty', () => {
    expect(resolveStatusEngineConfig({ STATUS_ENGINE_OWNED_CONDITIONS: ' , ' }).ownedConditions).toEqual([
      'Ready',
      'Reconciling',
      'Stalled',
    ])
  })
})
