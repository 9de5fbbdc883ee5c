export type EnvSource = Record<string, string | undefined>

export const readNonEmptyEnv = (value: string | undefined) => {
  if (!value) return null
  const normalized = value.trim()
  return normalized.length > 0 ? normalized : null
}

export const parseBooleanEnv = (value: string | undefined, fallback: boolean) => {
  const normalized = readNonEmptyEnv(value)?.toLowerCase()
  if (!normalized) return fallback
  if (['1', 'true', 'yes', 'y', 'on'].includes(normalized)) return true
  if (['0', 'false', 'no', 'n', 'off'].includes(normalized)) return false
  return fallback
}

export const parseNumberEnv = (value: string | undefined, fallback: number, min = 0) => {
  const normalized = readNonEmptyEnv(value)
  if (!normalized) return fallback
  const parsed = Number.parseInt(normalized, 10)
  if (!Number.isFinite(parsed) || parsed < min) return fallback
  return parsed
}

export const normalizeStringList = (values: unknown[]) =>
  values
    .filter((item): item is string => typeof item === 'string')
    .map((item) => item.trim())
    .filter((item) => item.length > 0)

export const parseEnvList = (value: string | undefined) => {
  if (!value) return []
  return normalizeStringList(value.split(','))
}

/** Accepts either a JSON array of strings or a comma separated list. */
export const parseEnvStringList = (name: string, value: string | undefined) => {
  const normalized = readNonEmptyEnv(value)
  if (!normalized) return []
  if (!normalized.startsWith('[')) return parseEnvList(normalized)
  try {
    const parsed: unknown = JSON.parse(normalized)
    if (Array.isArray(parsed)) return normalizeStringList(parsed)
    console.warn(`[status] ${name} must be a JSON array of strings`)
    return []
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    console.warn(`[status] invalid ${name} JSON: ${message}`)
    return []
  }
}
