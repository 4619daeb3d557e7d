import type {
  DecisionStage,
  FilterSpec,
  ProceedVerdict,
  WebRequestRegistry
} from "@reqgate/core";

import type { RuleSet, StageRule } from "./load-rules";

// One catch-all rule makes the whole stage unfiltered.
export const filterSpecFor = (rules: StageRule<unknown>[]): FilterSpec =>
  rules.some((rule) => rule.urls.length === 0)
    ? {}
    : { urls: rules.flatMap((rule) => rule.urls) };

const PROCEED: ProceedVerdict = { kind: "proceed" };

export const firstMatch =
  <V>(rules: StageRule<V>[]) =>
  (details: { url: string }): V | ProceedVerdict =>
    rules.find((rule) => rule.filter.matches(details.url))?.action ?? PROCEED;

/**
 * Registers one handler per stage that has rules. Returns the stages that got
 * a handler.
 */
export const installRules = <C extends object>(
  registry: WebRequestRegistry<C>,
  rules: RuleSet
): DecisionStage[] => {
  const installed: DecisionStage[] = [];
  if (rules.beforeRequest.length > 0) {
    registry.onBeforeRequest(filterSpecFor(rules.beforeRequest), firstMatch(rules.beforeRequest));
    installed.push("beforeRequest");
  }
  if (rules.beforeSendHeaders.length > 0) {
    registry.onBeforeSendHeaders(
      filterSpecFor(rules.beforeSendHeaders),
      firstMatch(rules.beforeSendHeaders)
    );
    installed.push("beforeSendHeaders");
  }
  if (rules.headersReceived.length > 0) {
    registry.onHeadersReceived(
      filterSpecFor(rules.headersReceived),
      firstMatch(rules.headersReceived)
    );
    installed.push("headersReceived");
  }
  return installed;
};
