import { FilterError } from "./errors";

type HostMatcher =
  | { kind: "any" }
  | { kind: "exact"; host: string }
  | { kind: "suffix"; domain: string };

type CompiledPattern =
  | { kind: "all-urls" }
  | {
      kind: "pattern";
      scheme: string;
      host: HostMatcher | null;
      port: string | null;
      path: RegExp;
    };

const ALL_URLS = "<all_urls>";
const SCHEME_RE = /^(\*|[a-z][a-z0-9+.-]*)$/;
const WILDCARD_SCHEMES = new Set(["http", "https"]);

const DEFAULT_PORTS: Record<string, string> = {
  http: "80",
  https: "443",
  ws: "80",
  wss: "443",
  ftp: "21"
};

const escapeRegExp = (input: string) => input.replace(/[.+?^${}()|[\]\\]/g, "\\$&");

const compilePath = (path: string) => new RegExp(`^${escapeRegExp(path).replace(/\*/g, ".*")}$`);

const parseHost = (pattern: string, host: string): HostMatcher => {
  if (host === "*") {
    return { kind: "any" };
  }
  if (host.startsWith("*.")) {
    const domain = host.slice(2).toLowerCase();
    if (!domain || domain.includes("*")) {
      throw new FilterError(pattern, "wildcard host must be '*' or '*.<domain>'");
    }
    return { kind: "suffix", domain };
  }
  if (host.includes("*")) {
    throw new FilterError(pattern, "'*' is only allowed as the first host label");
  }
  return { kind: "exact", host: host.toLowerCase() };
};

const splitPort = (pattern: string, authority: string) => {
  // Leave bracketed IPv6 literals alone unless a port follows the bracket.
  const bracketEnd = authority.lastIndexOf("]");
  const colon = authority.lastIndexOf(":");
  if (colon === -1 || colon < bracketEnd) {
    return { host: authority, port: null };
  }
  const port = authority.slice(colon + 1);
  if (port !== "*" && !/^\d{1,5}$/.test(port)) {
    throw new FilterError(pattern, `invalid port "${port}"`);
  }
  if (port !== "*" && Number(port) > 65535) {
    throw new FilterError(pattern, `port ${port} is out of range`);
  }
  return { host: authority.slice(0, colon), port: port === "*" ? null : String(Number(port)) };
};

const parsePattern = (pattern: string): CompiledPattern => {
  if (pattern === ALL_URLS) {
    return { kind: "all-urls" };
  }

  const separator = pattern.indexOf("://");
  if (separator === -1) {
    throw new FilterError(pattern, "missing scheme separator '://'");
  }
  const scheme = pattern.slice(0, separator).toLowerCase();
  if (!SCHEME_RE.test(scheme)) {
    throw new FilterError(pattern, `invalid scheme "${scheme}"`);
  }

  const rest = pattern.slice(separator + 3);
  const slash = rest.indexOf("/");
  if (slash === -1) {
    throw new FilterError(pattern, "missing path");
  }
  const authority = rest.slice(0, slash);
  const path = rest.slice(slash);

  if (scheme === "file") {
    return { kind: "pattern", scheme, host: null, port: null, path: compilePath(path) };
  }

  if (!authority) {
    throw new FilterError(pattern, "empty host");
  }
  const { host, port } = splitPort(pattern, authority);
  if (!host) {
    throw new FilterError(pattern, "empty host");
  }

  return {
    kind: "pattern",
    scheme,
    host: parseHost(pattern, host),
    port,
    path: compilePath(path)
  };
};

const matchesHost = (matcher: HostMatcher, hostname: string) => {
  switch (matcher.kind) {
    case "any":
      return true;
    case "exact":
      return hostname === matcher.host;
    case "suffix":
      return hostname === matcher.domain || hostname.endsWith(`.${matcher.domain}`);
  }
};

const matchesPattern = (compiled: CompiledPattern, url: URL) => {
  if (compiled.kind === "all-urls") {
    return true;
  }
  const scheme = url.protocol.slice(0, -1);
  if (compiled.scheme === "*" ? !WILDCARD_SCHEMES.has(scheme) : compiled.scheme !== scheme) {
    return false;
  }
  if (compiled.host && !matchesHost(compiled.host, url.hostname)) {
    return false;
  }
  if (compiled.port !== null) {
    const port = url.port || DEFAULT_PORTS[scheme] || "";
    if (port !== compiled.port) {
      return false;
    }
  }
  return compiled.path.test(`${url.pathname}${url.search}`);
};

/**
 * Set of compiled URL match patterns. An empty set matches every URL;
 * otherwise a URL matches when any one pattern does.
 */
export class UrlFilter {
  readonly patterns: readonly string[];
  private readonly compiled: readonly CompiledPattern[];

  private constructor(patterns: readonly string[], compiled: readonly CompiledPattern[]) {
    this.patterns = patterns;
    this.compiled = compiled;
  }

  static all(): UrlFilter {
    return new UrlFilter([], []);
  }

  static compile(patterns: Iterable<string> = []): UrlFilter {
    const sources: string[] = [];
    const compiled: CompiledPattern[] = [];
    for (const pattern of new Set(patterns)) {
      if (typeof pattern !== "string") {
        throw new FilterError(String(pattern), "pattern must be a string");
      }
      compiled.push(parsePattern(pattern));
      sources.push(pattern);
    }
    return new UrlFilter(Object.freeze(sources), Object.freeze(compiled));
  }

  get isEmpty() {
    return this.compiled.length === 0;
  }

  matches(url: string): boolean {
    if (this.compiled.length === 0) {
      return true;
    }
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return false;
    }
    return this.compiled.some((pattern) => matchesPattern(pattern, parsed));
  }
}
