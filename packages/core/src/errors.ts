import type { LifecycleStage } from "./types";

export class ReqgateError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class FilterError extends ReqgateError {
  readonly pattern: string;

  constructor(pattern: string, reason: string) {
    super("INVALID_PATTERN", `Invalid URL pattern "${pattern}": ${reason}`);
    this.pattern = pattern;
  }
}

export type RegistryErrorCode = "ALREADY_EXISTS" | "NOT_FOUND" | "DESTROYED";

export class RegistryError extends ReqgateError {
  declare readonly code: RegistryErrorCode;

  constructor(code: RegistryErrorCode, message: string) {
    super(code, message);
  }
}

/**
 * A handler threw, rejected, or otherwise failed to produce a verdict.
 * Reported to the host; the transaction proceeds unchanged.
 */
export class HandlerFault extends ReqgateError {
  readonly stage: LifecycleStage;
  readonly requestId: number;

  constructor(stage: LifecycleStage, requestId: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("HANDLER_FAULT", `Handler for ${stage} failed on request ${requestId}: ${reason}`, {
      cause
    });
    this.stage = stage;
    this.requestId = requestId;
  }
}

export type ProtocolViolationCode =
  | "DOUBLE_RESOLUTION"
  | "VERDICT_NOT_ALLOWED"
  | "MALFORMED_VERDICT"
  | "MISSING_DETAILS";

export class ProtocolViolation extends ReqgateError {
  declare readonly code: ProtocolViolationCode;
  readonly stage: LifecycleStage;
  readonly requestId: number;

  constructor(
    code: ProtocolViolationCode,
    stage: LifecycleStage,
    requestId: number,
    message: string
  ) {
    super(code, message);
    this.stage = stage;
    this.requestId = requestId;
  }
}
