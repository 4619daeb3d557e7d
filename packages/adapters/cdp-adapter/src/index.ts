import type {
  DispatchEngine,
  RequestDetails,
  RequestHeaders,
  ResourceType,
  ResponseHeaders,
  Transaction
} from "@reqgate/core";
import { settle } from "@reqgate/core";
import CDP, { type Options as CdpOptions } from "chrome-remote-interface";

type CdpConnectionOptions = CdpOptions;

export type CdpClient = {
  send: (method: string, params?: Record<string, unknown>) => Promise<unknown>;
  on: (event: string, listener: (payload: unknown) => void) => void;
  off?: (event: string, listener: (payload: unknown) => void) => void;
  close?: () => Promise<void>;
};

export type InterceptTarget = { kind: "cdp-tab"; tabId: number } | { kind: "cdp-session"; session: CdpClient };

export interface InterceptSession {
  /** Requests the session still holds state for. */
  trackedRequests(): number;
  navigate(url: string): Promise<void>;
  stop(): Promise<void>;
}

export type CdpAdapterOptions = {
  host?: string;
  port?: number;
  target?: CdpConnectionOptions["target"];
  clientFactory?: (options: CdpConnectionOptions) => Promise<CdpClient>;
};

export type AttachOptions<C extends object> = {
  engine: DispatchEngine<C>;
  context: C;
  onError?(error: Error): void;
};

type HeaderEntry = { name: string; value: string };

type RequestPaused = {
  requestId: string;
  networkId?: string;
  frameId?: string;
  resourceType?: string;
  request: { url: string; method: string; headers: RequestHeaders };
  responseStatusCode?: number;
  responseStatusText?: string;
  responseErrorReason?: string;
  responseHeaders: HeaderEntry[];
};

type ResponsePayload = {
  url: string;
  status: number;
  statusText: string;
  headers: RequestHeaders;
  fromDiskCache: boolean;
};

type RequestWillBeSent = {
  requestId: string;
  frameId?: string;
  type?: string;
  request: { url: string; method: string; headers: RequestHeaders };
  redirectResponse?: ResponsePayload;
};

type ResponseReceived = { requestId: string; response: ResponsePayload };

type LoadingFinished = { requestId: string };

type LoadingFailed = { requestId: string; errorText: string };

type ResponseState = {
  statusCode: number;
  statusLine: string;
  fromCache: boolean;
  responseHeaders: ResponseHeaders;
};

// Chromium net error codes for the failure texts CDP reports.
const NET_ERRORS: Record<string, number> = {
  "net::ERR_FAILED": -2,
  "net::ERR_ABORTED": -3,
  "net::ERR_TIMED_OUT": -7,
  "net::ERR_BLOCKED_BY_CLIENT": -20,
  "net::ERR_CONNECTION_REFUSED": -102,
  "net::ERR_NAME_NOT_RESOLVED": -105,
  "net::ERR_INTERNET_DISCONNECTED": -106,
  "net::ERR_CERT_AUTHORITY_INVALID": -202
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const readString = (record: Record<string, unknown>, key: string) => {
  const value = record[key];
  return typeof value === "string" ? value : undefined;
};

const readNumber = (record: Record<string, unknown>, key: string) => {
  const value = record[key];
  return typeof value === "number" ? value : undefined;
};

// Header maps come from Object.fromEntries so any header name, "__proto__"
// included, stays an own key.
const normalizeHeaders = (headers: unknown): RequestHeaders => {
  if (!isRecord(headers)) return {};
  const entries: Array<[string, string]> = [];
  for (const key of Object.keys(headers)) {
    const value = headers[key];
    if (value === undefined || value === null) continue;
    entries.push([key, Array.isArray(value) ? value.join(", ") : String(value)]);
  }
  return Object.fromEntries(entries);
};

const readHeaderEntries = (value: unknown): HeaderEntry[] => {
  if (!Array.isArray(value)) return [];
  const entries: HeaderEntry[] = [];
  for (const item of value) {
    if (!isRecord(item)) continue;
    const name = readString(item, "name");
    const headerValue = readString(item, "value");
    if (name !== undefined && headerValue !== undefined) {
      entries.push({ name, value: headerValue });
    }
  }
  return entries;
};

const readRequest = (value: unknown) => {
  if (!isRecord(value)) return undefined;
  const url = readString(value, "url");
  if (!url) return undefined;
  return {
    url,
    method: readString(value, "method") || "GET",
    headers: normalizeHeaders(value.headers)
  };
};

const readResponse = (value: unknown): ResponsePayload | undefined => {
  if (!isRecord(value)) return undefined;
  const url = readString(value, "url");
  const status = readNumber(value, "status");
  if (url === undefined || status === undefined) return undefined;
  return {
    url,
    status,
    statusText: readString(value, "statusText") ?? "",
    headers: normalizeHeaders(value.headers),
    fromDiskCache: value.fromDiskCache === true
  };
};

const readRequestPaused = (payload: unknown): RequestPaused | undefined => {
  if (!isRecord(payload)) return undefined;
  const requestId = readString(payload, "requestId");
  const request = readRequest(payload.request);
  if (!requestId || !request) return undefined;
  return {
    requestId,
    networkId: readString(payload, "networkId"),
    frameId: readString(payload, "frameId"),
    resourceType: readString(payload, "resourceType"),
    request,
    responseStatusCode: readNumber(payload, "responseStatusCode"),
    responseStatusText: readString(payload, "responseStatusText"),
    responseErrorReason: readString(payload, "responseErrorReason"),
    responseHeaders: readHeaderEntries(payload.responseHeaders)
  };
};

const readRequestWillBeSent = (payload: unknown): RequestWillBeSent | undefined => {
  if (!isRecord(payload)) return undefined;
  const requestId = readString(payload, "requestId");
  const request = readRequest(payload.request);
  if (!requestId || !request) return undefined;
  return {
    requestId,
    frameId: readString(payload, "frameId"),
    type: readString(payload, "type"),
    request,
    redirectResponse: readResponse(payload.redirectResponse)
  };
};

const readResponseReceived = (payload: unknown): ResponseReceived | undefined => {
  if (!isRecord(payload)) return undefined;
  const requestId = readString(payload, "requestId");
  const response = readResponse(payload.response);
  if (!requestId || !response) return undefined;
  return { requestId, response };
};

const readLoadingFinished = (payload: unknown): LoadingFinished | undefined => {
  if (!isRecord(payload)) return undefined;
  const requestId = readString(payload, "requestId");
  return requestId ? { requestId } : undefined;
};

const readLoadingFailed = (payload: unknown): LoadingFailed | undefined => {
  if (!isRecord(payload)) return undefined;
  const requestId = readString(payload, "requestId");
  if (!requestId) return undefined;
  return { requestId, errorText: readString(payload, "errorText") ?? "net::ERR_FAILED" };
};

const mapResourceType = (input?: string): ResourceType => {
  if (!input) return "other";
  switch (input.toLowerCase()) {
    case "document":
      return "mainFrame";
    case "stylesheet":
      return "stylesheet";
    case "script":
      return "script";
    case "image":
      return "image";
    case "font":
      return "font";
    case "media":
      return "media";
    case "xhr":
      return "xhr";
    case "fetch":
      return "fetch";
    case "websocket":
      return "webSocket";
    default:
      return "other";
  }
};

const getHeaderValue = (headers: RequestHeaders, name: string) => {
  const target = name.toLowerCase();
  for (const key in headers) {
    if (key.toLowerCase() === target) {
      return headers[key];
    }
  }
  return undefined;
};

const toResponseHeaders = (entries: HeaderEntry[]): ResponseHeaders => {
  const grouped = new Map<string, string[]>();
  for (const { name, value } of entries) {
    const values = grouped.get(name);
    if (values) {
      values.push(value);
    } else {
      grouped.set(name, [value]);
    }
  }
  return Object.fromEntries(grouped);
};

const splitResponseHeaders = (headers: RequestHeaders): ResponseHeaders =>
  Object.fromEntries(Object.entries(headers).map(([name, value]) => [name, value.split("\n")]));

const requestHeaderEntries = (headers: RequestHeaders): HeaderEntry[] =>
  Object.entries(headers).map(([name, value]) => ({ name, value }));

const responseHeaderEntries = (headers: ResponseHeaders): HeaderEntry[] =>
  Object.entries(headers).flatMap(([name, values]) => values.map((value) => ({ name, value })));

const statusLineOf = (statusCode: number, statusText?: string) =>
  `HTTP/1.1 ${statusCode}${statusText ? ` ${statusText}` : ""}`;

const toError = (error: unknown) => (error instanceof Error ? error : new Error(String(error)));

const subscribe = (client: CdpClient, eventName: string, handler: (payload: unknown) => void) => {
  client.on(eventName, handler);
  return () => client.off?.(eventName, handler);
};

/**
 * Drives a DispatchEngine from a Chrome DevTools Protocol session: paused
 * `Fetch` requests go through the decision stages, `Network` events feed
 * the simple ones.
 */
export class CdpAdapter {
  readonly name = "cdp";

  private options: CdpAdapterOptions;

  constructor(options: CdpAdapterOptions = {}) {
    this.options = options;
  }

  async start<C extends object>(
    target: InterceptTarget,
    attach: AttachOptions<C>
  ): Promise<InterceptSession> {
    const { engine, context } = attach;
    const reportError = (error: unknown) => {
      if (attach.onError) {
        attach.onError(toError(error));
        return;
      }
      console.warn("reqgate cdp adapter error", { error });
    };

    const clientFactory =
      this.options.clientFactory ??
      ((options: CdpConnectionOptions) =>
        CDP({
          host: options.host,
          port: options.port,
          target: options.target
        }) as unknown as Promise<CdpClient>);

    const resolveTabTarget = (tabId: number): CdpConnectionOptions["target"] => {
      return (targets) => {
        const match = targets.find((entry) => entry.id === String(tabId));
        if (match) return match;
        if (tabId >= 0 && tabId < targets.length) return tabId;
        return targets[0] ?? 0;
      };
    };

    const client =
      target.kind === "cdp-session"
        ? target.session
        : await clientFactory({
            host: this.options.host,
            port: this.options.port,
            target: this.options.target ?? resolveTabTarget(target.tabId)
          });
    const ownsClient = target.kind !== "cdp-session";

    let nextId = 1;
    const requestIds = new Map<string, number>();
    const requests = new Map<string, RequestDetails>();
    const responses = new Map<string, ResponseState>();
    const pendingTasks = new Set<Promise<void>>();

    const idFor = (key: string) => {
      const existing = requestIds.get(key);
      if (existing !== undefined) return existing;
      const id = nextId++;
      requestIds.set(key, id);
      return id;
    };

    const trackRequest = (
      key: string,
      input: {
        url: string;
        method: string;
        headers: RequestHeaders;
        resourceType?: string;
        frameId?: string;
      }
    ) => {
      const request: RequestDetails = {
        id: idFor(key),
        url: input.url,
        method: input.method,
        resourceType: mapResourceType(input.resourceType),
        referrer: getHeaderValue(input.headers, "referer") ?? "",
        timestamp: Date.now(),
        frameId: input.frameId
      };
      requests.set(key, request);
      return request;
    };

    const forget = (key: string) => {
      requestIds.delete(key);
      requests.delete(key);
      responses.delete(key);
    };

    const transactionFor = (request: RequestDetails): Transaction<C> => ({ context, request });

    const failRequest = (requestId: string) =>
      client.send("Fetch.failRequest", { requestId, errorReason: "BlockedByClient" });

    const redirectTo = (requestId: string, url: string) =>
      client.send("Fetch.fulfillRequest", {
        requestId,
        responseCode: 307,
        responseHeaders: [{ name: "Location", value: url }]
      });

    const handleRequestStage = async (paused: RequestPaused) => {
      const key = paused.networkId ?? paused.requestId;
      const request = trackRequest(key, {
        ...paused.request,
        resourceType: paused.resourceType,
        frameId: paused.frameId
      });
      const transaction = transactionFor(request);

      const beforeRequestOut: { redirectUrl?: string } = {};
      const beforeRequest = await settle(
        engine.dispatchDecision("beforeRequest", transaction, {}, beforeRequestOut)
      );
      if (beforeRequest.status === "aborted") {
        await failRequest(paused.requestId);
        return;
      }
      if (beforeRequestOut.redirectUrl) {
        await redirectTo(paused.requestId, beforeRequestOut.redirectUrl);
        return;
      }

      const headersOut = { requestHeaders: { ...paused.request.headers } };
      const beforeSendHeaders = await settle(
        engine.dispatchDecision(
          "beforeSendHeaders",
          transaction,
          { requestHeaders: paused.request.headers },
          headersOut
        )
      );
      if (beforeSendHeaders.status === "aborted") {
        await failRequest(paused.requestId);
        return;
      }

      if (beforeSendHeaders.verdict === "modify-headers") {
        await client.send("Fetch.continueRequest", {
          requestId: paused.requestId,
          headers: requestHeaderEntries(headersOut.requestHeaders)
        });
      } else {
        await client.send("Fetch.continueRequest", { requestId: paused.requestId });
      }
      engine.dispatchSimple("sendHeaders", transaction, {
        requestHeaders: headersOut.requestHeaders
      });
    };

    const handleResponseStage = async (paused: RequestPaused) => {
      if (paused.responseErrorReason || paused.responseStatusCode === undefined) {
        await client.send("Fetch.continueRequest", { requestId: paused.requestId });
        return;
      }
      const key = paused.networkId ?? paused.requestId;
      const request =
        requests.get(key) ??
        trackRequest(key, {
          ...paused.request,
          resourceType: paused.resourceType,
          frameId: paused.frameId
        });

      const statusCode = paused.responseStatusCode;
      const out: { responseHeaders?: ResponseHeaders; allowedUnsafeRedirectUrl?: string } = {};
      const outcome = await settle(
        engine.dispatchDecision(
          "headersReceived",
          transactionFor(request),
          {
            statusCode,
            statusLine: statusLineOf(statusCode, paused.responseStatusText),
            responseHeaders: toResponseHeaders(paused.responseHeaders)
          },
          out
        )
      );

      if (outcome.status === "aborted") {
        await failRequest(paused.requestId);
        return;
      }
      if (out.allowedUnsafeRedirectUrl) {
        await redirectTo(paused.requestId, out.allowedUnsafeRedirectUrl);
        return;
      }
      if (out.responseHeaders) {
        await client.send("Fetch.continueResponse", {
          requestId: paused.requestId,
          responseCode: statusCode,
          responseHeaders: responseHeaderEntries(out.responseHeaders)
        });
        return;
      }
      await client.send("Fetch.continueRequest", { requestId: paused.requestId });
    };

    // A stage that fails still releases its paused request.
    const runTask = (requestId: string, task: Promise<void>) => {
      const tracked = task.catch(async (error: unknown) => {
        reportError(error);
        await client.send("Fetch.continueRequest", { requestId }).catch(reportError);
      });
      pendingTasks.add(tracked);
      tracked.finally(() => pendingTasks.delete(tracked));
    };

    const handleRequestPaused = (payload: unknown) => {
      const paused = readRequestPaused(payload);
      if (!paused) return;
      const atResponse = paused.responseStatusCode !== undefined || !!paused.responseErrorReason;
      runTask(
        paused.requestId,
        atResponse ? handleResponseStage(paused) : handleRequestStage(paused)
      );
    };

    const handleRequestWillBeSent = (payload: unknown) => {
      const event = readRequestWillBeSent(payload);
      if (!event) return;
      const previous = requests.get(event.requestId);
      if (event.redirectResponse && previous) {
        engine.dispatchSimple("beforeRedirect", transactionFor(previous), {
          redirectUrl: event.request.url,
          statusCode: event.redirectResponse.status,
          fromCache: event.redirectResponse.fromDiskCache
        });
      }
      if (!previous || event.redirectResponse) {
        trackRequest(event.requestId, {
          ...event.request,
          resourceType: event.type,
          frameId: event.frameId
        });
      }
    };

    const handleResponseReceived = (payload: unknown) => {
      const event = readResponseReceived(payload);
      if (!event) return;
      const request = requests.get(event.requestId);
      if (!request) return;
      const response: ResponseState = {
        statusCode: event.response.status,
        statusLine: statusLineOf(event.response.status, event.response.statusText),
        fromCache: event.response.fromDiskCache,
        responseHeaders: splitResponseHeaders(event.response.headers)
      };
      responses.set(event.requestId, response);
      engine.dispatchSimple("responseStarted", transactionFor(request), response);
    };

    const handleLoadingFinished = (payload: unknown) => {
      const event = readLoadingFinished(payload);
      if (!event) return;
      const request = requests.get(event.requestId);
      if (!request) return;
      const response = responses.get(event.requestId) ?? {
        statusCode: 0,
        statusLine: "",
        fromCache: false,
        responseHeaders: {}
      };
      forget(event.requestId);
      engine.dispatchSimple("completed", transactionFor(request), { ...response, netError: 0 });
    };

    const handleLoadingFailed = (payload: unknown) => {
      const event = readLoadingFailed(payload);
      if (!event) return;
      const request = requests.get(event.requestId);
      if (!request) return;
      forget(event.requestId);
      engine.dispatchSimple("errorOccurred", transactionFor(request), {
        netError: NET_ERRORS[event.errorText] ?? -2,
        fromCache: false
      });
    };

    const cleanupHandlers: Array<() => void> = [];
    try {
      cleanupHandlers.push(subscribe(client, "Fetch.requestPaused", handleRequestPaused));
      cleanupHandlers.push(subscribe(client, "Network.requestWillBeSent", handleRequestWillBeSent));
      cleanupHandlers.push(subscribe(client, "Network.responseReceived", handleResponseReceived));
      cleanupHandlers.push(subscribe(client, "Network.loadingFinished", handleLoadingFinished));
      cleanupHandlers.push(subscribe(client, "Network.loadingFailed", handleLoadingFailed));

      await client.send("Network.enable");
      await client.send("Fetch.enable", {
        patterns: [
          { urlPattern: "*", requestStage: "Request" },
          { urlPattern: "*", requestStage: "Response" }
        ]
      });
    } catch (error) {
      cleanupHandlers.forEach((cleanup) => cleanup());
      reportError(error);
      if (ownsClient && client.close) {
        await client.close().catch(reportError);
      }
      throw error;
    }

    let pageEnabled = false;

    return {
      trackedRequests: () => requests.size,
      navigate: async (url: string) => {
        if (!pageEnabled) {
          await client.send("Page.enable");
          pageEnabled = true;
        }
        await client.send("Page.navigate", { url });
      },
      stop: async () => {
        cleanupHandlers.forEach((cleanup) => cleanup());
        // Releases every paused decision with proceed before the client goes away.
        engine.contexts.onContextDestroyed(context);
        await Promise.all(pendingTasks);
        requestIds.clear();
        requests.clear();
        responses.clear();
        await client.send("Fetch.disable").catch(reportError);
        if (ownsClient) {
          await client.close?.();
        }
      }
    };
  }
}
