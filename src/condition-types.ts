export const READY_CONDITION = 'Ready'
export const STALLED_CONDITION = 'Stalled'
export const RECONCILING_CONDITION = 'Reconciling'

export const SUCCEEDED_REASON = 'Succeeded'
export const FAILED_REASON = 'ReconciliationFailed'
export const PROGRESSING_REASON = 'Progressing'

export const RECONCILE_REQUEST_ANNOTATION = 'reconcile.status.io/requestedAt'

// Stalled and Reconciling read as bad when True wherever they are summarized.
export const STANDARD_NEGATIVE_POLARITY = [STALLED_CONDITION, RECONCILING_CONDITION] as const

export const STANDARD_OWNED_CONDITIONS = [READY_CONDITION, RECONCILING_CONDITION, STALLED_CONDITION] as const
