import { STANDARD_OWNED_CONDITIONS } from './condition-types'
import { type EnvSource, parseBooleanEnv, parseEnvStringList, parseNumberEnv, readNonEmptyEnv } from './env-config'

export type StatusEngineConfig = {
  fieldOwner: string
  successMessage: string
  requeueIntervalMs: number
  ownedConditions: string[]
  debug: boolean
}

const DEFAULT_CONFIG: StatusEngineConfig = {
  fieldOwner: 'status-controller',
  successMessage: 'Reconciliation succeeded',
  requeueIntervalMs: 600_000,
  ownedConditions: [...STANDARD_OWNED_CONDITIONS],
  debug: false,
}

export const resolveStatusEngineConfig = (env: EnvSource = process.env): StatusEngineConfig => {
  const rawInterval = readNonEmptyEnv(env.STATUS_ENGINE_REQUEUE_INTERVAL_SECONDS)
  const intervalSeconds = parseNumberEnv(rawInterval ?? undefined, DEFAULT_CONFIG.requeueIntervalMs / 1000, 1)
  if (rawInterval && String(intervalSeconds) !== rawInterval) {
    console.warn(
      `[status] STATUS_ENGINE_REQUEUE_INTERVAL_SECONDS must be an integer >= 1 (got ${JSON.stringify(rawInterval)}); using ${intervalSeconds}`,
    )
  }

  const ownedConditions = parseEnvStringList('STATUS_ENGINE_OWNED_CONDITIONS', env.STATUS_ENGINE_OWNED_CONDITIONS)

  return {
    fieldOwner: readNonEmptyEnv(env.STATUS_ENGINE_FIELD_OWNER) ?? DEFAULT_CONFIG.fieldOwner,
    successMessage: readNonEmptyEnv(env.STATUS_ENGINE_SUCCESS_MESSAGE) ?? DEFAULT_CONFIG.successMessage,
    requeueIntervalMs: intervalSeconds * 1000,
    ownedConditions: ownedConditions.length > 0 ? ownedConditions : [...DEFAULT_CONFIG.ownedConditions],
    debug: parseBooleanEnv(env.STATUS_ENGINE_DEBUG, DEFAULT_CONFIG.debug),
  }
}
