export type { CheckableResource, ConformanceOptions, ConformanceViolation } from './check'
export { checkStatusConformance } from './check'
export * from './condition-types'
export type {
  Condition,
  ConditionGetter,
  ConditionSetter,
  ConditionStatus,
  ConditionUpdate,
  StatusResource,
} from './conditions'
export {
  deleteCondition,
  falseCondition,
  getCondition,
  hasCondition,
  isFalse,
  isReady,
  isReconciling,
  isStalled,
  isTrue,
  isUnknown,
  markFalse,
  markReconciling,
  markStalled,
  markTrue,
  markUnknown,
  normalizeConditions,
  setCondition,
  toConditionUpdate,
  trueCondition,
  unknownCondition,
} from './conditions'
export type { StatusEngineConfig } from './config'
export { resolveStatusEngineConfig } from './config'
export {
  ConditionSetSpecError,
  FinalizeContradictionError,
  InvalidResourceError,
  StatusPatchError,
} from './errors'
export { createKubeStatusClient } from './kube-status-client'
export type { StatusLogger } from './logger'
export { createConsoleLogger, silentLogger } from './logger'
export type { PatchHelperOptions, PatchOption } from './patch-options'
export {
  addPatchOptions,
  resolvePatchOptions,
  withFieldOwner,
  withOwnedConditions,
  withStatusObservedGeneration,
} from './patch-options'
export { progressiveStatus } from './progressive-status'
export type { ObjectResource } from './resource'
export { createObjectResource } from './resource'
export type { IsResultSuccess, ReconcileResult, SuccessType } from './result'
export {
  determineSuccessType,
  isZeroResult,
  successNoRequeue,
  successWithRequeue,
} from './result'
export type { ReconcileOutcome, ResultFinalizerOptions } from './result-finalizer'
export { createResultFinalizer, ResultFinalizer } from './result-finalizer'
export type {
  StatusClient,
  StatusPatch,
  StatusPatcherService,
  StatusPatchRequest,
  StatusPatchResult,
} from './status-patcher'
export {
  buildStatusPatch,
  makeConfiguredStatusPatcher,
  makeStatusPatcher,
  StatusPatcher,
  StatusPatcherLive,
} from './status-patcher'
export type { CompiledConditionSet, ConditionSetSpec, Polarity } from './summarize'
export { compileConditionSet, summarize } from './summarize'
