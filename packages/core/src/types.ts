export type ResourceType =
  | "mainFrame"
  | "subFrame"
  | "stylesheet"
  | "script"
  | "image"
  | "font"
  | "media"
  | "xhr"
  | "fetch"
  | "webSocket"
  | "other"
  | (string & {});

export type RequestHeaders = Record<string, string>;
export type ResponseHeaders = Record<string, string[]>;

export interface RequestDetails {
  id: number;
  url: string;
  method: string;
  resourceType: ResourceType;
  referrer: string;
  timestamp: number;
  frameId?: string;
}

/**
 * What the network engine hands over for one stage of one request. The
 * engine owns it for the duration of the call; nothing here keeps a
 * reference past completion.
 */
export interface Transaction<C extends object = object> {
  context: C;
  request: RequestDetails;
}

export interface SimpleStageDetails {
  sendHeaders: { requestHeaders: RequestHeaders };
  beforeRedirect: { redirectUrl: string; statusCode: number; fromCache: boolean };
  responseStarted: {
    statusCode: number;
    statusLine: string;
    fromCache: boolean;
    responseHeaders: ResponseHeaders;
  };
  errorOccurred: { netError: number; fromCache: boolean };
  completed: {
    statusCode: number;
    statusLine: string;
    fromCache: boolean;
    responseHeaders: ResponseHeaders;
    netError: number;
  };
}

export interface DecisionStageDetails {
  beforeRequest: Record<never, never>;
  beforeSendHeaders: { requestHeaders: RequestHeaders };
  headersReceived: { statusCode: number; statusLine: string; responseHeaders: ResponseHeaders };
}

/** Out-parameter slots the engine lets a decision stage fill. */
export interface DecisionStageOutput {
  beforeRequest: { redirectUrl?: string };
  beforeSendHeaders: { requestHeaders: RequestHeaders };
  headersReceived: { responseHeaders?: ResponseHeaders; allowedUnsafeRedirectUrl?: string };
}

export type SimpleStage = keyof SimpleStageDetails;
export type DecisionStage = keyof DecisionStageDetails;
export type LifecycleStage = SimpleStage | DecisionStage;

export type ProceedVerdict = { kind: "proceed" };
export type CancelVerdict = { kind: "cancel" };
export type RedirectVerdict = { kind: "redirect"; url: string };
export type ModifyHeadersVerdict = { kind: "modify-headers"; headers: RequestHeaders };
export type OverrideResponseHeadersVerdict = {
  kind: "override-response-headers";
  headers: ResponseHeaders;
};
export type RedirectUnsafeVerdict = { kind: "redirect-unsafe"; url: string };

export interface StageVerdicts {
  beforeRequest: ProceedVerdict | CancelVerdict | RedirectVerdict;
  beforeSendHeaders: ProceedVerdict | CancelVerdict | ModifyHeadersVerdict;
  headersReceived:
    | ProceedVerdict
    | CancelVerdict
    | OverrideResponseHeadersVerdict
    | RedirectUnsafeVerdict;
}

export type Verdict = StageVerdicts[DecisionStage];
export type VerdictKind = Verdict["kind"];

export interface StageDetailsMap extends SimpleStageDetails, DecisionStageDetails {}

// Simple stages take no verdict.
export interface StageVerdictMap extends StageVerdicts {
  sendHeaders: never;
  beforeRedirect: never;
  responseStarted: never;
  errorOccurred: never;
  completed: never;
}

export type StageDetails<S extends LifecycleStage> = Readonly<RequestDetails & StageDetailsMap[S]>;

export type VerdictResolver<S extends LifecycleStage> = (verdict: StageVerdictMap[S]) => void;

export type HandlerResult<V> = V | void | Promise<V | void>;

/**
 * Handler type per stage. Decision handlers either return a verdict or call
 * `resolve` later; simple handlers only observe.
 */
export type StageHandlers = {
  [S in LifecycleStage]: (
    details: StageDetails<S>,
    resolve: VerdictResolver<S>
  ) => HandlerResult<StageVerdictMap[S]>;
};

export type StageHandler<S extends LifecycleStage> = StageHandlers[S];
export type SimpleHandler<S extends SimpleStage = SimpleStage> = StageHandlers[S];
export type DecisionHandler<S extends DecisionStage = DecisionStage> = StageHandlers[S];

export interface FilterSpec {
  urls?: readonly string[] | ReadonlySet<string>;
}

export type DecisionStatus = "ok" | "aborted";

export interface DecisionOutcome {
  status: DecisionStatus;
  verdict: VerdictKind;
}

export interface PendingDispatch {
  status: "pending";
  completion: Promise<DecisionOutcome>;
}

export type DispatchResult = DecisionOutcome | PendingDispatch;

export interface DispatchReporter {
  onLog?(msg: string, meta?: unknown): void;
  onError?(error: Error): void;
}
