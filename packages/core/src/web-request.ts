import { isLifecycleStage } from "./catalog";
import { RegistryError } from "./errors";
import { ListenerTable, type HandlerEntry } from "./listener-table";
import type { PendingDecision } from "./pending-decision";
import type { FilterSpec, LifecycleStage, StageHandlers } from "./types";
import { UrlFilter } from "./url-filter";

export type ListenerArgs<S extends LifecycleStage> =
  | [handler: StageHandlers[S] | null]
  | [filter: FilterSpec | undefined, handler: StageHandlers[S] | null];

const isFilterSpec = (value: unknown): value is FilterSpec =>
  typeof value === "object" && value !== null;

/**
 * Stage to handler bindings for one owning context, plus the decisions
 * currently suspended on its behalf.
 */
export class WebRequestRegistry<C extends object = object> {
  readonly context: C;
  private listeners = new ListenerTable<StageHandlers>();
  private pending = new Set<PendingDecision>();
  private destroyed = false;

  constructor(context: C) {
    this.context = context;
  }

  get isDestroyed() {
    return this.destroyed;
  }

  get pendingCount() {
    return this.pending.size;
  }

  get listenerCount() {
    return this.listeners.size;
  }

  set<S extends LifecycleStage>(
    stage: S,
    filter: FilterSpec | undefined,
    handler: StageHandlers[S] | null
  ): void {
    if (this.destroyed) {
      throw new RegistryError("DESTROYED", "Cannot register listeners on a destroyed context");
    }
    if (!isLifecycleStage(stage)) {
      throw new TypeError(`Unknown lifecycle stage "${String(stage)}"`);
    }
    if (handler === null) {
      this.listeners.clear(stage);
      return;
    }
    if (typeof handler !== "function") {
      throw new TypeError("Must pass null or a Function");
    }
    if (filter !== undefined && !isFilterSpec(filter)) {
      throw new TypeError("Filter must be an object with a urls field");
    }
    const urls = filter?.urls;
    if (typeof urls === "string") {
      throw new TypeError("filter.urls must be a collection of patterns, not a string");
    }
    this.listeners.set(stage, { filter: UrlFilter.compile(urls ?? []), handler });
  }

  clear(stage: LifecycleStage): boolean {
    return this.listeners.clear(stage);
  }

  get<S extends LifecycleStage>(stage: S): HandlerEntry<StageHandlers[S]> | undefined {
    if (this.destroyed) {
      return undefined;
    }
    return this.listeners.get(stage);
  }

  /** Stages that currently have a handler, in registration order. */
  stages(): LifecycleStage[] {
    return this.listeners.stages();
  }

  onBeforeRequest(...args: ListenerArgs<"beforeRequest">) {
    this.setFromArgs("beforeRequest", args);
  }

  onBeforeSendHeaders(...args: ListenerArgs<"beforeSendHeaders">) {
    this.setFromArgs("beforeSendHeaders", args);
  }

  onHeadersReceived(...args: ListenerArgs<"headersReceived">) {
    this.setFromArgs("headersReceived", args);
  }

  onSendHeaders(...args: ListenerArgs<"sendHeaders">) {
    this.setFromArgs("sendHeaders", args);
  }

  onBeforeRedirect(...args: ListenerArgs<"beforeRedirect">) {
    this.setFromArgs("beforeRedirect", args);
  }

  onResponseStarted(...args: ListenerArgs<"responseStarted">) {
    this.setFromArgs("responseStarted", args);
  }

  onErrorOccurred(...args: ListenerArgs<"errorOccurred">) {
    this.setFromArgs("errorOccurred", args);
  }

  onCompleted(...args: ListenerArgs<"completed">) {
    this.setFromArgs("completed", args);
  }

  track(token: PendingDecision): void {
    this.pending.add(token);
  }

  untrack(token: PendingDecision): void {
    this.pending.delete(token);
  }

  /**
   * Drops every listener and releases every suspended decision with
   * `proceed`. Called when the owning context goes away.
   */
  destroy(): void {
    if (this.destroyed) {
      return;
    }
    this.destroyed = true;
    this.listeners.reset();
    const tokens = Array.from(this.pending);
    this.pending.clear();
    for (const token of tokens) {
      token.cancel();
    }
  }

  private setFromArgs<S extends LifecycleStage>(stage: S, args: ListenerArgs<S>) {
    if (args.length === 1) {
      this.set(stage, undefined, args[0]);
      return;
    }
    this.set(stage, args[0], args[1]);
  }
}
