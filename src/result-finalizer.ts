import {
  FAILED_REASON,
  READY_CONDITION,
  RECONCILING_CONDITION,
  STALLED_CONDITION,
  SUCCEEDED_REASON,
} from './condition-types'
import type { StatusEngineConfig } from './config'
import { deleteCondition, getCondition, isStalled, type StatusResource, setCondition } from './conditions'
import { FinalizeContradictionError, toError } from './errors'
import { createConsoleLogger, type StatusLogger } from './logger'
import {
  determineSuccessType,
  hasError,
  type IsResultSuccess,
  isZeroResult,
  type ReconcileResult,
  type SuccessType,
  successWithRequeue,
} from './result'
import { type CompiledConditionSet, type ConditionSetSpec, compileConditionSet, summarize } from './summarize'

export type ResultFinalizerOptions = {
  isSuccess: IsResultSuccess
  successMessage: string
  conditionSets?: readonly ConditionSetSpec[]
  logger?: StatusLogger
}

/**
 * failed: the reconciler returned an error.
 * succeeded: the success predicate holds.
 * stalled: no error, no requeue and Stalled=True.
 * requeued: no error, a requeue other than the success one.
 * idle: no error, no requeue, and the discipline expects one.
 */
export type ReconcileOutcome = 'failed' | 'succeeded' | 'stalled' | 'requeued' | 'idle'

/**
 * Computes the terminal status of one reconcile attempt: runs the configured
 * summaries, then settles Ready, Stalled and Reconciling from the result.
 * Stateless apart from its configuration, so one instance serves every
 * reconcile of a controller.
 */
export class ResultFinalizer {
  readonly successType: SuccessType
  private readonly isSuccess: IsResultSuccess
  private readonly successMessage: string
  private readonly conditionSets: readonly CompiledConditionSet[]
  private readonly logger: StatusLogger

  constructor(options: ResultFinalizerOptions) {
    this.isSuccess = options.isSuccess
    this.successMessage = options.successMessage
    this.conditionSets = (options.conditionSets ?? []).map(compileConditionSet)
    this.logger = options.logger ?? createConsoleLogger({ debug: false })
    this.successType = determineSuccessType(options.isSuccess)
  }

  classify(obj: StatusResource, result: ReconcileResult, error: unknown): ReconcileOutcome {
    if (hasError(error)) return 'failed'
    // A zero result reads as success to a no-requeue reconciler; Stalled=True settles it as terminal.
    if (isZeroResult(result) && isStalled(obj)) return 'stalled'
    if (this.isSuccess(result, error)) return 'succeeded'
    return isZeroResult(result) ? 'idle' : 'requeued'
  }

  finalize(obj: StatusResource, result: ReconcileResult, error: unknown): Error | null {
    const outcome = this.classify(obj, result, error)

    // Prune first so summaries never read conditions this outcome clears.
    switch (outcome) {
      case 'succeeded':
        deleteCondition(obj, STALLED_CONDITION)
        deleteCondition(obj, RECONCILING_CONDITION)
        break
      case 'stalled':
        deleteCondition(obj, RECONCILING_CONDITION)
        break
      case 'requeued':
        deleteCondition(obj, STALLED_CONDITION)
        break
      default:
        break
    }

    for (const set of this.conditionSets) {
      summarize(obj, set)
    }

    let finalError: Error | null = null
    switch (outcome) {
      case 'failed':
        finalError = this.settleFailed(obj, error)
        break
      case 'succeeded':
        finalError = this.settleSucceeded(obj)
        break
      case 'stalled':
        this.settleStalled(obj)
        break
      default:
        break
    }

    const request = obj.getReconcileRequest()
    if (request && request !== obj.getLastHandledReconcileAt()) {
      obj.setLastHandledReconcileAt(request)
    }

    this.logger.debug('finalized reconcile result', {
      outcome,
      successType: this.successType,
      ready: getCondition(obj, READY_CONDITION)?.status ?? null,
      error: finalError?.message ?? null,
    })
    return finalError
  }

  private settleFailed(obj: StatusResource, error: unknown) {
    const normalized = toError(error)
    // An existing Ready=False carries the precise cause recorded by business logic.
    if (getCondition(obj, READY_CONDITION)?.status !== 'False') {
      setCondition(obj, { type: READY_CONDITION, status: 'False', reason: FAILED_REASON, message: normalized.message })
    }
    return normalized
  }

  private settleSucceeded(obj: StatusResource) {
    const ready = getCondition(obj, READY_CONDITION)
    if (!ready || ready.status === 'Unknown') {
      setCondition(obj, { type: READY_CONDITION, status: 'True', reason: SUCCEEDED_REASON, message: this.successMessage })
      return null
    }
    if (ready.status === 'True') return null
    return new FinalizeContradictionError(READY_CONDITION, ready.reason, ready.message)
  }

  private settleStalled(obj: StatusResource) {
    const stalled = getCondition(obj, STALLED_CONDITION)
    if (!stalled || getCondition(obj, READY_CONDITION)?.status === 'False') return
    setCondition(obj, { type: READY_CONDITION, status: 'False', reason: stalled.reason, message: stalled.message })
  }
}

/** A finalizer for a periodically requeued reconciler, configured from the environment. */
export const createResultFinalizer = (
  config: StatusEngineConfig,
  conditionSets: readonly ConditionSetSpec[] = [],
) =>
  new ResultFinalizer({
    isSuccess: successWithRequeue(config.requeueIntervalMs),
    successMessage: config.successMessage,
    conditionSets,
    logger: createConsoleLogger({ debug: config.debug }),
  })
