export {
  EVENT_CATALOG,
  LIFECYCLE_STAGES,
  isDecisionStage,
  isLifecycleStage,
  isSimpleStage,
  isVerdictAllowed,
  missingDetailKeys
} from "./catalog";
export type { EventCatalog, StageFamily } from "./catalog";
export { ContextRegistry } from "./context-registry";
export { DispatchEngine, settle } from "./dispatch-engine";
export type { DispatchEngineOptions } from "./dispatch-engine";
export {
  FilterError,
  HandlerFault,
  ProtocolViolation,
  RegistryError,
  ReqgateError
} from "./errors";
export type { ProtocolViolationCode, RegistryErrorCode } from "./errors";
export { ListenerTable } from "./listener-table";
export type { HandlerEntry } from "./listener-table";
export { PendingDecision } from "./pending-decision";
export type { PendingDecisionOptions, PendingState } from "./pending-decision";
export type {
  CancelVerdict,
  DecisionHandler,
  DecisionOutcome,
  DecisionStage,
  DecisionStageDetails,
  DecisionStageOutput,
  DecisionStatus,
  DispatchReporter,
  DispatchResult,
  FilterSpec,
  HandlerResult,
  LifecycleStage,
  ModifyHeadersVerdict,
  OverrideResponseHeadersVerdict,
  PendingDispatch,
  ProceedVerdict,
  RedirectUnsafeVerdict,
  RedirectVerdict,
  RequestDetails,
  RequestHeaders,
  ResourceType,
  ResponseHeaders,
  SimpleHandler,
  SimpleStage,
  SimpleStageDetails,
  StageDetails,
  StageDetailsMap,
  StageHandler,
  StageHandlers,
  StageVerdictMap,
  StageVerdicts,
  Transaction,
  Verdict,
  VerdictKind,
  VerdictResolver
} from "./types";
export { UrlFilter } from "./url-filter";
export { applyVerdict, validateVerdict } from "./verdicts";
export type { VerdictOutput } from "./verdicts";
export { WebRequestRegistry } from "./web-request";
export type { ListenerArgs } from "./web-request";
