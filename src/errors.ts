export class ConditionSetSpecError extends Error {
  readonly _tag = 'ConditionSetSpecError'
}

/**
 * Raised when a reconcile reports success while the resource's own Ready
 * condition says otherwise. It points at a bug in the calling reconciler.
 */
export class FinalizeContradictionError extends Error {
  readonly _tag = 'FinalizeContradictionError'

  constructor(
    readonly conditionType: string,
    readonly reason: string,
    detail: string,
  ) {
    super(`reconcile reported success but ${conditionType}=False (${reason}): ${detail}`)
  }
}

export class StatusPatchError extends Error {
  readonly _tag = 'StatusPatchError'
}

export const toError = (error: unknown) =>
  error instanceof Error ? error : new Error(String(error), { cause: error })

export class InvalidResourceError extends Error {
  readonly _tag = 'InvalidResourceError'
}
