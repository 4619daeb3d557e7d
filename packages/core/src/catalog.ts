import type {
  DecisionStage,
  DecisionStageDetails,
  LifecycleStage,
  SimpleStage,
  SimpleStageDetails,
  StageVerdicts
} from "./types";

export type StageFamily = "simple" | "decision";

type CatalogEntry<S extends LifecycleStage> = S extends SimpleStage
  ? {
      family: "simple";
      detailKeys: readonly (keyof SimpleStageDetails[S])[];
      verdicts: readonly [];
    }
  : S extends DecisionStage
    ? {
        family: "decision";
        detailKeys: readonly (keyof DecisionStageDetails[S])[];
        verdicts: readonly StageVerdicts[S]["kind"][];
      }
    : never;

export type EventCatalog = { readonly [S in LifecycleStage]: CatalogEntry<S> };

export const EVENT_CATALOG: EventCatalog = {
  beforeRequest: {
    family: "decision",
    detailKeys: [],
    verdicts: ["proceed", "cancel", "redirect"]
  },
  beforeSendHeaders: {
    family: "decision",
    detailKeys: ["requestHeaders"],
    verdicts: ["proceed", "cancel", "modify-headers"]
  },
  headersReceived: {
    family: "decision",
    detailKeys: ["statusCode", "statusLine", "responseHeaders"],
    verdicts: ["proceed", "cancel", "override-response-headers", "redirect-unsafe"]
  },
  sendHeaders: {
    family: "simple",
    detailKeys: ["requestHeaders"],
    verdicts: []
  },
  beforeRedirect: {
    family: "simple",
    detailKeys: ["redirectUrl", "statusCode", "fromCache"],
    verdicts: []
  },
  responseStarted: {
    family: "simple",
    detailKeys: ["statusCode", "statusLine", "fromCache", "responseHeaders"],
    verdicts: []
  },
  errorOccurred: {
    family: "simple",
    detailKeys: ["netError", "fromCache"],
    verdicts: []
  },
  completed: {
    family: "simple",
    detailKeys: ["statusCode", "statusLine", "fromCache", "responseHeaders", "netError"],
    verdicts: []
  }
};

// Order in which a single transaction moves through the stages. A redirect
// loops back from beforeRedirect to beforeRequest; completed and
// errorOccurred are alternative endings.
export const LIFECYCLE_STAGES: readonly LifecycleStage[] = [
  "beforeRequest",
  "beforeSendHeaders",
  "beforeRedirect",
  "headersReceived",
  "sendHeaders",
  "responseStarted",
  "completed",
  "errorOccurred"
];

export const isLifecycleStage = (value: unknown): value is LifecycleStage =>
  typeof value === "string" && Object.hasOwn(EVENT_CATALOG, value);

export const isDecisionStage = (stage: LifecycleStage): stage is DecisionStage =>
  EVENT_CATALOG[stage].family === "decision";

export const isSimpleStage = (stage: LifecycleStage): stage is SimpleStage =>
  EVENT_CATALOG[stage].family === "simple";

export const isVerdictAllowed = (stage: DecisionStage, kind: string) => {
  const allowed: readonly string[] = EVENT_CATALOG[stage].verdicts;
  return allowed.includes(kind);
};

export const missingDetailKeys = (stage: LifecycleStage, details: unknown) => {
  const expected: readonly string[] = EVENT_CATALOG[stage].detailKeys;
  if (typeof details !== "object" || details === null) {
    return expected.slice();
  }
  return expected.filter((key) => !(key in details));
};
