import { describe, expect, it } from 'vitest'

import { PROGRESSING_REASON, READY_CONDITION, RECONCILING_CONDITION, STALLED_CONDITION } from '~/condition-types'
import {
  falseCondition,
  markFalse,
  markStalled,
  markTrue,
  markUnknown,
  trueCondition,
  unknownCondition,
} from '~/conditions'
import { progressiveStatus } from '~/progressive-status'
import { conditionStates, createFakeResource, sortStates } from '~/test-utils/fake-resource'

describe('progressiveStatus', () => {
  it('marks Reconciling and an unknown Ready on a fresh resource', () => {
    const obj = createFakeResource()

    progressiveStatus(false, obj, PROGRESSING_REASON, 'building artifact for revision %s', 'abc123')

    expect(conditionStates(obj)).toEqual(
      sortStates([
        trueCondition(RECONCILING_CONDITION, PROGRESSING_REASON, 'building artifact for revision abc123'),
        unknownCondition(READY_CONDITION, PROGRESSING_REASON, 'building artifact for revision abc123'),
      ]),
    )
  })

  it('replaces the reason and message of an unknown Ready', () => {
    const obj = createFakeResource()
    markUnknown(obj, READY_CONDITION, 'Z', 'z')

    progressiveStatus(false, obj, 'Y', 'y')

    expect(conditionStates(obj)).toEqual(
      sortStates([trueCondition(RECONCILING_CONDITION, 'Y', 'y'), unknownCondition(READY_CONDITION, 'Y', 'y')]),
    )
  })

  it('keeps Ready=True without drift', () => {
    const obj = createFakeResource()
    markTrue(obj, READY_CONDITION, 'Succeeded', 'stored artifact')

    progressiveStatus(false, obj, 'Progressing', 'checking for updates')

    expect(conditionStates(obj)).toEqual(
      sortStates([
        trueCondition(READY_CONDITION, 'Succeeded', 'stored artifact'),
        trueCondition(RECONCILING_CONDITION, 'Progressing', 'checking for updates'),
      ]),
    )
  })

  it('moves Ready=True to Unknown on drift', () => {
    const obj = createFakeResource()
    markTrue(obj, READY_CONDITION, 'Succeeded', 'stored artifact')

    progressiveStatus(true, obj, 'NewRevision', 'new upstream revision')

    expect(conditionStates(obj)).toEqual(
      sortStates([
        unknownCondition(READY_CONDITION, 'NewRevision', 'new upstream revision'),
        trueCondition(RECONCILING_CONDITION, 'NewRevision', 'new upstream revision'),
      ]),
    )
  })

  it('keeps Ready=False so the last failure stays visible', () => {
    const obj = createFakeResource()
    markFalse(obj, READY_CONDITION, 'ReconciliationFailed', 'fetch failed')

    progressiveStatus(true, obj, 'Progressing', 'retrying')

    expect(conditionStates(obj)).toEqual(
      sortStates([
        falseCondition(READY_CONDITION, 'ReconciliationFailed', 'fetch failed'),
        trueCondition(RECONCILING_CONDITION, 'Progressing', 'retrying'),
      ]),
    )
  })

  it('clears Stalled', () => {
    const obj = createFakeResource()
    markStalled(obj, 'InvalidURL', 'invalid URL')
    markFalse(obj, READY_CONDITION, 'InvalidURL', 'invalid URL')

    progressiveStatus(false, obj, 'Progressing', 'retrying')

    expect(conditionStates(obj).map((condition) => condition.type)).not.toContain(STALLED_CONDITION)
  })
})
