import { describe, expect, it } from 'vitest'

import { determineSuccessType, isZeroResult, successNoRequeue, successWithRequeue } from '~/result'

describe('reconcile results', () => {
  it('treats a result without requeue directives as zero', () => {
    expect(isZeroResult({})).toBe(true)
    expect(isZeroResult({ requeue: false, requeueAfterMs: 0 })).toBe(true)
    expect(isZeroResult({ requeue: true })).toBe(false)
    expect(isZeroResult({ requeueAfterMs: 1_000 })).toBe(false)
  })

  it('accepts only the configured interval as success for requeueing reconcilers', () => {
    const isSuccess = successWithRequeue(60_000)

    expect(isSuccess({ requeueAfterMs: 60_000 }, null)).toBe(true)
    expect(isSuccess({ requeueAfterMs: 5_000 }, null)).toBe(false)
    expect(isSuccess({ requeue: true, requeueAfterMs: 60_000 }, null)).toBe(false)
    expect(isSuccess({}, null)).toBe(false)
    expect(isSuccess({ requeueAfterMs: 60_000 }, new Error('boom'))).toBe(false)
  })

  it('accepts only a zero result as success for one-shot reconcilers', () => {
    const isSuccess = successNoRequeue()

    expect(isSuccess({}, undefined)).toBe(true)
    expect(isSuccess({ requeue: true }, undefined)).toBe(false)
    expect(isSuccess({}, new Error('boom'))).toBe(false)
  })

  it('derives the success discipline from the predicate', () => {
    expect(determineSuccessType(successNoRequeue())).toBe('NoRequeueOnSuccess')
    expect(determineSuccessType(successWithRequeue(60_000))).toBe('RequeueOnSuccess')
    expect(determineSuccessType((result) => result.requeueAfterMs === 5_000)).toBe('RequeueOnSuccess')
  })
})
