import { ProtocolViolation } from "./errors";
import type { Report } from "./reporter";
import type { DecisionOutcome, DecisionStage, Verdict } from "./types";
import { PROCEED, validateVerdict } from "./verdicts";

export type PendingState = "pending" | "claimed" | "settled" | "cancelled";

export type PendingDecisionOptions = {
  stage: DecisionStage;
  requestId: number;
  apply: (verdict: Verdict) => DecisionOutcome;
  schedule: (task: () => void) => void;
  report: Report;
  onDone?: (token: PendingDecision) => void;
};

/**
 * One-shot continuation for a suspended decision stage.
 *
 * The first resolution claims the token and schedules the verdict onto the
 * transaction's execution context; later resolutions are reported and
 * dropped. `cancel()` releases the engine with `proceed` on the spot and
 * turns any scheduled application into a no-op.
 */
export class PendingDecision {
  readonly stage: DecisionStage;
  readonly requestId: number;
  readonly completion: Promise<DecisionOutcome>;

  private currentState: PendingState = "pending";
  private options: PendingDecisionOptions;
  private settleCompletion: (outcome: DecisionOutcome) => void;

  constructor(options: PendingDecisionOptions) {
    this.stage = options.stage;
    this.requestId = options.requestId;
    this.options = options;

    let settle: (outcome: DecisionOutcome) => void = () => undefined;
    this.completion = new Promise<DecisionOutcome>((resolve) => {
      settle = resolve;
    });
    this.settleCompletion = settle;
  }

  get state() {
    return this.currentState;
  }

  get isResolved() {
    return this.currentState !== "pending";
  }

  resolve(verdict: unknown): boolean {
    const { report } = this.options;

    if (this.currentState === "cancelled") {
      report.log("Ignored verdict after context teardown", {
        stage: this.stage,
        requestId: this.requestId
      });
      return false;
    }
    if (this.currentState !== "pending") {
      report.error(
        new ProtocolViolation(
          "DOUBLE_RESOLUTION",
          this.stage,
          this.requestId,
          `Decision for ${this.stage} on request ${this.requestId} was already resolved`
        )
      );
      return false;
    }

    const checked = validateVerdict(this.stage, this.requestId, verdict);
    let accepted: Verdict = { kind: "proceed" };
    if (checked instanceof ProtocolViolation) {
      report.error(checked);
    } else {
      accepted = checked;
    }

    this.currentState = "claimed";
    this.options.schedule(() => this.applyClaimed(accepted));
    return true;
  }

  cancel(): void {
    if (this.currentState === "settled" || this.currentState === "cancelled") {
      return;
    }
    this.currentState = "cancelled";
    this.finish(PROCEED);
  }

  private applyClaimed(verdict: Verdict) {
    if (this.currentState !== "claimed") {
      return;
    }
    this.currentState = "settled";
    let outcome = PROCEED;
    try {
      outcome = this.options.apply(verdict);
    } catch (error) {
      this.options.report.error(
        error instanceof Error ? error : new Error(`Failed to apply verdict: ${String(error)}`)
      );
    }
    this.finish(outcome);
  }

  private finish(outcome: DecisionOutcome) {
    this.settleCompletion(outcome);
    this.options.onDone?.(this);
  }
}
