import assert from "node:assert/strict";
import { describe, test } from "node:test";

import { ContextRegistry } from "../src/context-registry";
import { DispatchEngine, settle } from "../src/dispatch-engine";
import { HandlerFault, ProtocolViolation, type ReqgateError } from "../src/errors";
import type {
  DecisionStageOutput,
  RequestDetails,
  StageDetails,
  VerdictResolver
} from "../src/types";

type Session = { name: string };

const makeRequest = (url: string, id = 1): RequestDetails => ({
  id,
  url,
  method: "GET",
  resourceType: "mainFrame",
  referrer: "",
  timestamp: 1
});

const setup = (schedule?: (task: () => void) => void) => {
  const contexts = new ContextRegistry<Session>();
  const errors: ReqgateError[] = [];
  const logs: string[] = [];
  const engine = new DispatchEngine({
    contexts,
    schedule,
    reporter: {
      onError: (error) => {
        if (error instanceof HandlerFault || error instanceof ProtocolViolation) {
          errors.push(error);
        }
      },
      onLog: (msg) => logs.push(msg)
    }
  });
  const context: Session = { name: "default" };
  const registry = contexts.getOrCreate(context);
  const transaction = (url: string, id = 1) => ({ context, request: makeRequest(url, id) });
  return { contexts, engine, context, registry, errors, logs, transaction };
};

const manualScheduler = () => {
  const tasks: Array<() => void> = [];
  return {
    schedule: (task: () => void) => {
      tasks.push(task);
    },
    flush: () => {
      while (tasks.length > 0) {
        tasks.shift()?.();
      }
    }
  };
};

const responseDetails = {
  statusCode: 200,
  statusLine: "HTTP/1.1 200 OK",
  responseHeaders: { "content-type": ["text/html"] }
};

describe("DispatchEngine decision stages", () => {
  test("redirects matching urls and skips the handler for others", async () => {
    const { engine, registry, transaction } = setup();
    let calls = 0;
    registry.onBeforeRequest({ urls: ["*://example.com/*"] }, () => {
      calls += 1;
      return { kind: "redirect", url: "https://example.com/safe" };
    });

    const out: DecisionStageOutput["beforeRequest"] = {};
    const result = engine.dispatchDecision(
      "beforeRequest",
      transaction("https://example.com/login"),
      {},
      out
    );
    assert.equal(result.status, "pending");
    assert.deepEqual(await settle(result), { status: "ok", verdict: "redirect" });
    assert.equal(out.redirectUrl, "https://example.com/safe");

    const otherOut: DecisionStageOutput["beforeRequest"] = {};
    const other = engine.dispatchDecision(
      "beforeRequest",
      transaction("https://other.com/", 2),
      {},
      otherOut
    );
    assert.deepEqual(other, { status: "ok", verdict: "proceed" });
    assert.deepEqual(otherOut, {});
    assert.equal(calls, 1);
  });

  test("cancel at headersReceived aborts and leaves headers alone", async () => {
    const { engine, registry, transaction } = setup();
    registry.onHeadersReceived(() => ({ kind: "cancel" }));

    const out: DecisionStageOutput["headersReceived"] = {};
    const outcome = await settle(
      engine.dispatchDecision("headersReceived", transaction("https://a.test/"), responseDetails, out)
    );
    assert.deepEqual(outcome, { status: "aborted", verdict: "cancel" });
    assert.deepEqual(out, {});
  });

  test("cancel aborts at beforeSendHeaders too", async () => {
    const { engine, registry, transaction } = setup();
    registry.onBeforeSendHeaders(() => ({ kind: "cancel" }));

    const out = { requestHeaders: { accept: "*/*" } };
    const outcome = await settle(
      engine.dispatchDecision(
        "beforeSendHeaders",
        transaction("https://a.test/"),
        { requestHeaders: { accept: "*/*" } },
        out
      )
    );
    assert.equal(outcome.status, "aborted");
    assert.deepEqual(out.requestHeaders, { accept: "*/*" });
  });

  test("modified request headers replace the originals", async () => {
    const { engine, registry, transaction } = setup();
    const seen: StageDetails<"beforeSendHeaders">[] = [];
    registry.onBeforeSendHeaders((details) => {
      seen.push(details);
      return { kind: "modify-headers", headers: { "x-trace": "1" } };
    });

    const out = { requestHeaders: { accept: "*/*" } };
    const outcome = await settle(
      engine.dispatchDecision(
        "beforeSendHeaders",
        transaction("https://a.test/"),
        { requestHeaders: { accept: "*/*" } },
        out
      )
    );
    assert.deepEqual(outcome, { status: "ok", verdict: "modify-headers" });
    assert.deepEqual(out.requestHeaders, { "x-trace": "1" });
    assert.deepEqual(seen[0].requestHeaders, { accept: "*/*" });
    assert.equal(seen[0].url, "https://a.test/");
  });

  test("response header overrides and unsafe redirects fill their slots", async () => {
    const { engine, registry, transaction } = setup();
    registry.onHeadersReceived((details) =>
      details.url.endsWith("/move")
        ? { kind: "redirect-unsafe", url: "custom://elsewhere/" }
        : { kind: "override-response-headers", headers: { "cache-control": ["no-store"] } }
    );

    const overridden: DecisionStageOutput["headersReceived"] = {};
    await settle(
      engine.dispatchDecision(
        "headersReceived",
        transaction("https://a.test/page"),
        responseDetails,
        overridden
      )
    );
    assert.deepEqual(overridden.responseHeaders, { "cache-control": ["no-store"] });

    const moved: DecisionStageOutput["headersReceived"] = {};
    const outcome = await settle(
      engine.dispatchDecision("headersReceived", transaction("https://a.test/move"), responseDetails, moved)
    );
    assert.deepEqual(outcome, { status: "ok", verdict: "redirect-unsafe" });
    assert.equal(moved.allowedUnsafeRedirectUrl, "custom://elsewhere/");
    assert.equal(moved.responseHeaders, undefined);
  });

  test("after clear the stage proceeds synchronously", () => {
    const { engine, registry, transaction } = setup();
    registry.onBeforeSendHeaders(() => ({ kind: "cancel" }));
    registry.clear("beforeSendHeaders");

    const out = { requestHeaders: { accept: "*/*" } };
    const result = engine.dispatchDecision(
      "beforeSendHeaders",
      transaction("https://a.test/"),
      { requestHeaders: { accept: "*/*" } },
      out
    );
    assert.deepEqual(result, { status: "ok", verdict: "proceed" });
    assert.deepEqual(out, { requestHeaders: { accept: "*/*" } });
  });

  test("contexts without a registry proceed", () => {
    const { engine } = setup();
    const result = engine.dispatchDecision(
      "beforeRequest",
      { context: { name: "unregistered" }, request: makeRequest("https://a.test/") },
      {},
      {}
    );
    assert.deepEqual(result, { status: "ok", verdict: "proceed" });
  });

  test("handlers may resolve later through the resolver", async () => {
    const { engine, registry, transaction } = setup();
    const resolvers: VerdictResolver<"beforeRequest">[] = [];
    registry.onBeforeRequest((_details, resolve) => {
      resolvers.push(resolve);
    });

    const out: DecisionStageOutput["beforeRequest"] = {};
    const result = engine.dispatchDecision("beforeRequest", transaction("https://a.test/"), {}, out);
    assert.equal(result.status, "pending");
    assert.equal(registry.pendingCount, 1);

    setTimeout(() => resolvers[0]({ kind: "cancel" }), 5);
    assert.deepEqual(await settle(result), { status: "aborted", verdict: "cancel" });
    assert.equal(registry.pendingCount, 0);
  });

  test("only the first resolution is applied", async () => {
    const { engine, registry, transaction, errors } = setup();
    registry.onBeforeRequest((_details, resolve) => {
      resolve({ kind: "redirect", url: "https://a.test/first" });
      resolve({ kind: "cancel" });
    });

    const out: DecisionStageOutput["beforeRequest"] = {};
    const outcome = await settle(
      engine.dispatchDecision("beforeRequest", transaction("https://a.test/"), {}, out)
    );
    assert.deepEqual(outcome, { status: "ok", verdict: "redirect" });
    assert.equal(out.redirectUrl, "https://a.test/first");
    assert.deepEqual(
      errors.map((error) => error.code),
      ["DOUBLE_RESOLUTION"]
    );
  });

  test("a throwing handler fails open", async () => {
    const { engine, registry, transaction, errors } = setup();
    registry.onBeforeRequest(() => {
      throw new Error("boom");
    });

    const out: DecisionStageOutput["beforeRequest"] = {};
    const outcome = await settle(
      engine.dispatchDecision("beforeRequest", transaction("https://a.test/", 7), {}, out)
    );
    assert.deepEqual(outcome, { status: "ok", verdict: "proceed" });
    assert.deepEqual(out, {});
    assert.equal(errors.length, 1);
    assert.ok(errors[0] instanceof HandlerFault);
    assert.equal(errors[0].message, "Handler for beforeRequest failed on request 7: boom");
  });

  test("a rejecting handler fails open", async () => {
    const { engine, registry, transaction, errors } = setup();
    registry.onBeforeRequest(async () => {
      throw new Error("later");
    });

    const outcome = await settle(
      engine.dispatchDecision("beforeRequest", transaction("https://a.test/"), {}, {})
    );
    assert.deepEqual(outcome, { status: "ok", verdict: "proceed" });
    assert.deepEqual(
      errors.map((error) => error.code),
      ["HANDLER_FAULT"]
    );
  });

  test("verdicts outside the stage's set are violations and proceed", async () => {
    const { engine, registry, transaction, errors } = setup();
    Reflect.apply(registry.set, registry, [
      "beforeRequest",
      undefined,
      () => ({ kind: "modify-headers", headers: {} })
    ]);

    const out: DecisionStageOutput["beforeRequest"] = {};
    const outcome = await settle(
      engine.dispatchDecision("beforeRequest", transaction("https://a.test/"), {}, out)
    );
    assert.deepEqual(outcome, { status: "ok", verdict: "proceed" });
    assert.deepEqual(out, {});
    assert.deepEqual(
      errors.map((error) => error.code),
      ["VERDICT_NOT_ALLOWED"]
    );
  });

  test("malformed redirect targets are violations", async () => {
    const { engine, registry, transaction, errors } = setup();
    registry.onBeforeRequest(() => ({ kind: "redirect", url: "not a url" }));

    const out: DecisionStageOutput["beforeRequest"] = {};
    const outcome = await settle(
      engine.dispatchDecision("beforeRequest", transaction("https://a.test/"), {}, out)
    );
    assert.deepEqual(outcome, { status: "ok", verdict: "proceed" });
    assert.equal(out.redirectUrl, undefined);
    assert.deepEqual(
      errors.map((error) => error.code),
      ["MALFORMED_VERDICT"]
    );
  });

  test("destroying the context releases a pending decision", async () => {
    const { contexts, context, engine, registry, transaction, errors, logs } = setup();
    const resolvers: VerdictResolver<"beforeRequest">[] = [];
    registry.onBeforeRequest((_details, resolve) => {
      resolvers.push(resolve);
    });

    const out: DecisionStageOutput["beforeRequest"] = {};
    const result = engine.dispatchDecision("beforeRequest", transaction("https://a.test/"), {}, out);
    contexts.onContextDestroyed(context);

    assert.deepEqual(await settle(result), { status: "ok", verdict: "proceed" });
    assert.equal(registry.pendingCount, 0);

    resolvers[0]({ kind: "redirect", url: "https://a.test/late" });
    assert.deepEqual(out, {});
    assert.deepEqual(errors, []);
    assert.ok(logs.includes("Ignored verdict after context teardown"));
  });

  test("verdicts are applied on the scheduler", async () => {
    const scheduler = manualScheduler();
    const { engine, registry, transaction } = setup(scheduler.schedule);
    registry.onBeforeRequest(() => ({ kind: "redirect", url: "https://a.test/next" }));

    const out: DecisionStageOutput["beforeRequest"] = {};
    const result = engine.dispatchDecision("beforeRequest", transaction("https://a.test/"), {}, out);
    assert.deepEqual(out, {});

    scheduler.flush();
    assert.deepEqual(await settle(result), { status: "ok", verdict: "redirect" });
    assert.equal(out.redirectUrl, "https://a.test/next");
  });

  test("teardown wins over a verdict still waiting for the scheduler", async () => {
    const scheduler = manualScheduler();
    const { contexts, context, engine, registry, transaction } = setup(scheduler.schedule);
    registry.onBeforeRequest(() => ({ kind: "redirect", url: "https://a.test/next" }));

    const out: DecisionStageOutput["beforeRequest"] = {};
    const result = engine.dispatchDecision("beforeRequest", transaction("https://a.test/"), {}, out);
    contexts.onContextDestroyed(context);
    scheduler.flush();

    assert.deepEqual(await settle(result), { status: "ok", verdict: "proceed" });
    assert.deepEqual(out, {});
  });
});

describe("DispatchEngine simple stages", () => {
  test("handlers get a frozen snapshot of request and stage details", () => {
    const { engine, registry, transaction } = setup();
    const seen: StageDetails<"completed">[] = [];
    registry.onCompleted({ urls: ["https://a.test/*"] }, (details) => {
      seen.push(details);
    });

    const ran = engine.dispatchSimple("completed", transaction("https://a.test/done", 3), {
      ...responseDetails,
      fromCache: false,
      netError: 0
    });
    assert.equal(ran, true);
    assert.equal(seen.length, 1);
    assert.equal(seen[0].id, 3);
    assert.equal(seen[0].statusCode, 200);
    assert.equal(seen[0].netError, 0);
    assert.equal(Object.isFrozen(seen[0]), true);
  });

  test("only the latest handler runs", () => {
    const { engine, registry, transaction } = setup();
    const calls: string[] = [];
    registry.onSendHeaders(() => {
      calls.push("first");
    });
    registry.onSendHeaders(() => {
      calls.push("second");
    });

    engine.dispatchSimple("sendHeaders", transaction("https://a.test/"), { requestHeaders: {} });
    assert.deepEqual(calls, ["second"]);
  });

  test("filter mismatches and missing registries are no-ops", () => {
    const { engine, registry, transaction } = setup();
    registry.onErrorOccurred({ urls: ["https://a.test/*"] }, () => undefined);

    const details = { netError: -2, fromCache: false };
    assert.equal(engine.dispatchSimple("errorOccurred", transaction("https://b.test/"), details), false);
    assert.equal(
      engine.dispatchSimple(
        "errorOccurred",
        { context: { name: "other" }, request: makeRequest("https://a.test/") },
        details
      ),
      false
    );
  });

  test("handler failures are reported and contained", async () => {
    const { engine, registry, transaction, errors } = setup();
    registry.onResponseStarted(() => {
      throw new Error("observer broke");
    });
    registry.onBeforeRedirect(async () => {
      throw new Error("async observer broke");
    });

    const started = engine.dispatchSimple("responseStarted", transaction("https://a.test/"), {
      ...responseDetails,
      fromCache: false
    });
    const redirected = engine.dispatchSimple("beforeRedirect", transaction("https://a.test/"), {
      redirectUrl: "https://a.test/next",
      statusCode: 302,
      fromCache: false
    });
    await new Promise((resolve) => setTimeout(resolve, 0));

    assert.equal(started, true);
    assert.equal(redirected, true);
    assert.deepEqual(
      errors.map((error) => error.code),
      ["HANDLER_FAULT", "HANDLER_FAULT"]
    );
  });

  test("dispatches missing stage details are rejected before the handler", () => {
    const { engine, registry, transaction, errors } = setup();
    let calls = 0;
    registry.onCompleted(() => {
      calls += 1;
    });

    const ran = Reflect.apply(engine.dispatchSimple, engine, [
      "completed",
      transaction("https://a.test/"),
      { statusCode: 200 }
    ]);
    assert.equal(ran, false);
    assert.equal(calls, 0);
    assert.deepEqual(
      errors.map((error) => error.code),
      ["MISSING_DETAILS"]
    );
  });
});
