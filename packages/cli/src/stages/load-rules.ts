import fs from "node:fs/promises";
import path from "node:path";

import {
  isDecisionStage,
  isLifecycleStage,
  isSimpleStage,
  isVerdictAllowed,
  LIFECYCLE_STAGES,
  ProtocolViolation,
  UrlFilter,
  validateVerdict
} from "@reqgate/core";
import type { DecisionStage, StageVerdicts, Verdict } from "@reqgate/core";

export type StageRule<V> = {
  /** Empty when the rule applies to every url. */
  urls: string[];
  filter: UrlFilter;
  action: V;
};

export type RuleSet = { [S in DecisionStage]: StageRule<StageVerdicts[S]>[] };

export const emptyRuleSet = (): RuleSet => ({
  beforeRequest: [],
  beforeSendHeaders: [],
  headersReceived: []
});

export const countRules = (rules: RuleSet) =>
  rules.beforeRequest.length + rules.beforeSendHeaders.length + rules.headersReceived.length;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const toMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));

const ACTION_STAGES = LIFECYCLE_STAGES.filter(isDecisionStage);

const isStageVerdict = <S extends DecisionStage>(
  stage: S,
  verdict: Verdict
): verdict is StageVerdicts[S] => isVerdictAllowed(stage, verdict.kind);

const readUrls = (value: unknown, where: string) => {
  if (value === undefined) {
    return [];
  }
  const urls = Array.isArray(value)
    ? value.filter((item): item is string => typeof item === "string")
    : [];
  if (!Array.isArray(value) || urls.length !== value.length) {
    throw new Error(`${where}.urls must be an array of strings`);
  }
  return urls;
};

const readRule = <S extends DecisionStage>(
  stage: S,
  raw: Record<string, unknown>,
  where: string
): StageRule<StageVerdicts[S]> => {
  const urls = readUrls(raw.urls, where);
  let filter: UrlFilter;
  try {
    filter = UrlFilter.compile(urls);
  } catch (error) {
    throw new Error(`${where}.urls: ${toMessage(error)}`, { cause: error });
  }

  if (raw.action === undefined) {
    throw new Error(`${where}.action is required`);
  }
  const verdict = validateVerdict(stage, 0, raw.action);
  if (verdict instanceof ProtocolViolation) {
    throw new Error(`${where}.action: ${verdict.message}`);
  }
  if (!isStageVerdict(stage, verdict)) {
    throw new Error(`${where}.action: Verdict "${verdict.kind}" is not allowed for ${stage}`);
  }
  return { urls, filter, action: verdict };
};

/**
 * Validates a parsed rules document and groups its rules per stage, keeping
 * file order inside each stage.
 */
export const parseRules = (input: unknown): RuleSet => {
  if (!isRecord(input) || !Array.isArray(input.rules)) {
    throw new Error('Rules file must be an object with a "rules" array');
  }

  const list: unknown[] = input.rules;
  const rules = emptyRuleSet();
  list.forEach((raw, index) => {
    const where = `rules[${index}]`;
    if (!isRecord(raw)) {
      throw new Error(`${where} must be an object`);
    }
    const stage = raw.stage;
    if (!isLifecycleStage(stage) || isSimpleStage(stage)) {
      throw new Error(
        `${where}.stage "${String(stage)}" must be one of ${ACTION_STAGES.join(", ")}`
      );
    }
    switch (stage) {
      case "beforeRequest":
        rules.beforeRequest.push(readRule(stage, raw, where));
        break;
      case "beforeSendHeaders":
        rules.beforeSendHeaders.push(readRule(stage, raw, where));
        break;
      case "headersReceived":
        rules.headersReceived.push(readRule(stage, raw, where));
        break;
    }
  });
  return rules;
};

export const loadRules = async (filePath: string): Promise<RuleSet> => {
  const resolved = path.resolve(filePath);
  const text = await fs.readFile(resolved, "utf8");
  let input: unknown;
  try {
    input = JSON.parse(text);
  } catch (error) {
    throw new Error(`Invalid JSON in ${resolved}: ${toMessage(error)}`, { cause: error });
  }
  return parseRules(input);
};
