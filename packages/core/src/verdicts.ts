import { isVerdictAllowed } from "./catalog";
import { ProtocolViolation } from "./errors";
import type {
  DecisionOutcome,
  DecisionStage,
  RequestHeaders,
  ResponseHeaders,
  Verdict
} from "./types";

/** Every out-parameter slot any decision stage exposes. */
export type VerdictOutput = {
  redirectUrl?: string;
  requestHeaders?: RequestHeaders;
  responseHeaders?: ResponseHeaders;
  allowedUnsafeRedirectUrl?: string;
};

export const PROCEED: DecisionOutcome = Object.freeze({ status: "ok", verdict: "proceed" });

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

// Header maps are built with Object.fromEntries so names such as "__proto__"
// stay ordinary own keys.
const toRequestHeaders = (value: unknown): RequestHeaders | null => {
  if (!isRecord(value)) return null;
  const entries: Array<[string, string]> = [];
  for (const [name, header] of Object.entries(value)) {
    if (typeof header !== "string") return null;
    entries.push([name, header]);
  }
  return Object.fromEntries(entries);
};

const toResponseHeaders = (value: unknown): ResponseHeaders | null => {
  if (!isRecord(value)) return null;
  const entries: Array<[string, string[]]> = [];
  for (const [name, header] of Object.entries(value)) {
    if (typeof header === "string") {
      entries.push([name, [header]]);
      continue;
    }
    if (!Array.isArray(header)) return null;
    const values = header.filter((item): item is string => typeof item === "string");
    if (values.length !== header.length) return null;
    entries.push([name, values]);
  }
  return Object.fromEntries(entries);
};

const toUrl = (value: unknown) => (typeof value === "string" && URL.canParse(value) ? value : null);

/**
 * Checks a handler's verdict against the stage's allowed set and copies it
 * out of the handler's hands. Returns the violation instead of throwing.
 */
export const validateVerdict = (
  stage: DecisionStage,
  requestId: number,
  verdict: unknown
): Verdict | ProtocolViolation => {
  const malformed = (reason: string) =>
    new ProtocolViolation(
      "MALFORMED_VERDICT",
      stage,
      requestId,
      `Malformed verdict for ${stage}: ${reason}`
    );

  if (!isRecord(verdict) || typeof verdict.kind !== "string") {
    return malformed("expected an object with a string kind");
  }
  const kind = verdict.kind;
  if (!isVerdictAllowed(stage, kind)) {
    return new ProtocolViolation(
      "VERDICT_NOT_ALLOWED",
      stage,
      requestId,
      `Verdict "${kind}" is not allowed for ${stage}`
    );
  }

  switch (kind) {
    case "proceed":
      return { kind: "proceed" };
    case "cancel":
      return { kind: "cancel" };
    case "redirect":
    case "redirect-unsafe": {
      const url = toUrl(verdict.url);
      if (!url) return malformed(`"${String(verdict.url)}" is not an absolute URL`);
      return kind === "redirect" ? { kind: "redirect", url } : { kind: "redirect-unsafe", url };
    }
    case "modify-headers": {
      const headers = toRequestHeaders(verdict.headers);
      if (!headers) return malformed("request headers must map names to strings");
      return { kind: "modify-headers", headers };
    }
    case "override-response-headers": {
      const headers = toResponseHeaders(verdict.headers);
      if (!headers) return malformed("response headers must map names to strings or string arrays");
      return { kind: "override-response-headers", headers };
    }
    default:
      return malformed(`unknown kind "${kind}"`);
  }
};

/** Writes an accepted verdict into the engine's out-parameters. Headers are replaced, never merged. */
export const applyVerdict = (verdict: Verdict, out: VerdictOutput): DecisionOutcome => {
  switch (verdict.kind) {
    case "proceed":
      return PROCEED;
    case "cancel":
      return { status: "aborted", verdict: "cancel" };
    case "redirect":
      out.redirectUrl = verdict.url;
      break;
    case "modify-headers":
      out.requestHeaders = { ...verdict.headers };
      break;
    case "override-response-headers":
      out.responseHeaders = Object.fromEntries(
        Object.entries(verdict.headers).map(([name, values]) => [name, values.slice()])
      );
      break;
    case "redirect-unsafe":
      out.allowedUnsafeRedirectUrl = verdict.url;
      break;
  }
  return { status: "ok", verdict: verdict.kind };
};
