export type ReconcileResult = {
  requeue?: boolean
  requeueAfterMs?: number
}

export type IsResultSuccess = (result: ReconcileResult, error: unknown) => boolean

export type SuccessType = 'RequeueOnSuccess' | 'NoRequeueOnSuccess'

export const hasError = (error: unknown) => error !== null && error !== undefined

export const isZeroResult = (result: ReconcileResult) => !result.requeue && !result.requeueAfterMs

/** Success is no error and a requeue at exactly `intervalMs`. */
export const successWithRequeue =
  (intervalMs: number): IsResultSuccess =>
  (result, error) =>
    !hasError(error) && !result.requeue && result.requeueAfterMs === intervalMs

/** Success is no error and no requeue directive at all. */
export const successNoRequeue = (): IsResultSuccess => (result, error) => !hasError(error) && isZeroResult(result)

/**
 * Tells the two success disciplines apart by calling the predicate with a
 * fabricated zero result. Only a no-requeue reconciler calls that a success.
 */
export const determineSuccessType = (isSuccess: IsResultSuccess): SuccessType =>
  isSuccess({}, null) ? 'NoRequeueOnSuccess' : 'RequeueOnSuccess'
