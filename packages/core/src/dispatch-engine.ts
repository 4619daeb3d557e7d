import { missingDetailKeys } from "./catalog";
import type { ContextRegistry } from "./context-registry";
import { HandlerFault, ProtocolViolation } from "./errors";
import { PendingDecision } from "./pending-decision";
import { createReport, type Report } from "./reporter";
import type {
  DecisionOutcome,
  DecisionStage,
  DecisionStageOutput,
  DispatchReporter,
  DispatchResult,
  LifecycleStage,
  SimpleStage,
  StageDetails,
  StageDetailsMap,
  StageVerdictMap,
  Transaction
} from "./types";
import { applyVerdict, PROCEED } from "./verdicts";

export type DispatchEngineOptions<C extends object> = {
  contexts: ContextRegistry<C>;
  reporter?: DispatchReporter;
  /** Runs verdict application on the transaction's own execution context. */
  schedule?: (task: () => void) => void;
};

const isPromiseLike = (value: unknown): value is PromiseLike<unknown> =>
  typeof value === "object" &&
  value !== null &&
  "then" in value &&
  typeof value.then === "function";

export const settle = (result: DispatchResult): Promise<DecisionOutcome> =>
  result.status === "pending" ? result.completion : Promise.resolve(result);

export class DispatchEngine<C extends object = object> {
  readonly contexts: ContextRegistry<C>;
  private report: Report;
  private schedule: (task: () => void) => void;

  constructor(options: DispatchEngineOptions<C>) {
    this.contexts = options.contexts;
    this.report = createReport(options.reporter);
    this.schedule = options.schedule ?? ((task) => queueMicrotask(task));
  }

  /**
   * Fire-and-forget notification. Returns whether a handler ran; whatever
   * the handler does, the caller's control flow is untouched.
   */
  dispatchSimple<S extends SimpleStage>(
    stage: S,
    transaction: Transaction<C>,
    details: StageDetailsMap[S]
  ): boolean {
    const match = this.match(stage, transaction, details);
    if (!match) {
      return false;
    }

    const ignoreVerdict = (verdict: unknown) => {
      this.report.error(
        new ProtocolViolation(
          "VERDICT_NOT_ALLOWED",
          stage,
          transaction.request.id,
          `${stage} does not take a verdict, got ${JSON.stringify(verdict)}`
        )
      );
    };

    try {
      const result = match.entry.handler(this.snapshot(transaction, details), ignoreVerdict);
      if (isPromiseLike(result)) {
        result.then(undefined, (error: unknown) => {
          this.report.error(new HandlerFault(stage, transaction.request.id, error));
        });
      }
    } catch (error) {
      this.report.error(new HandlerFault(stage, transaction.request.id, error));
    }
    return true;
  }

  /**
   * Without a matching handler the result is `proceed`, returned
   * synchronously. Otherwise the handler gets a one-shot resolver and the
   * caller receives a pending result whose completion fires once the verdict
   * has been written into `out`.
   */
  dispatchDecision<S extends DecisionStage>(
    stage: S,
    transaction: Transaction<C>,
    details: StageDetailsMap[S],
    out: DecisionStageOutput[S]
  ): DispatchResult {
    const match = this.match(stage, transaction, details);
    if (!match) {
      return PROCEED;
    }

    const { registry, entry } = match;
    const requestId = transaction.request.id;
    const token = new PendingDecision({
      stage,
      requestId,
      apply: (verdict) => applyVerdict(verdict, out),
      schedule: this.schedule,
      report: this.report,
      onDone: (done) => registry.untrack(done)
    });
    registry.track(token);
    this.report.log("Waiting for verdict", { stage, requestId, url: transaction.request.url });

    const fail = (error: unknown) => {
      this.report.error(new HandlerFault(stage, requestId, error));
      if (!token.isResolved) {
        token.resolve({ kind: "proceed" });
      }
    };
    const resolve = (verdict: StageVerdictMap[S]) => {
      token.resolve(verdict);
    };

    try {
      const result = entry.handler(this.snapshot(transaction, details), resolve);
      if (isPromiseLike(result)) {
        result.then((verdict) => {
          if (verdict !== undefined) {
            token.resolve(verdict);
          }
        }, fail);
      } else if (result !== undefined) {
        token.resolve(result);
      }
    } catch (error) {
      fail(error);
    }

    return { status: "pending", completion: token.completion };
  }

  private match<S extends LifecycleStage>(
    stage: S,
    transaction: Transaction<C>,
    details: StageDetailsMap[S]
  ) {
    const registry = this.contexts.from(transaction.context);
    if (!registry) {
      return undefined;
    }
    const entry = registry.get(stage);
    if (!entry || !entry.filter.matches(transaction.request.url)) {
      return undefined;
    }
    const missing = missingDetailKeys(stage, details);
    if (missing.length > 0) {
      this.report.error(
        new ProtocolViolation(
          "MISSING_DETAILS",
          stage,
          transaction.request.id,
          `${stage} dispatched without ${missing.join(", ")}`
        )
      );
      return undefined;
    }
    return { registry, entry };
  }

  private snapshot<S extends LifecycleStage>(
    transaction: Transaction<C>,
    details: StageDetailsMap[S]
  ): StageDetails<S> {
    return Object.freeze({ ...transaction.request, ...structuredClone(details) });
  }
}
