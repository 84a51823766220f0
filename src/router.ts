import {
  ConfigurationError,
  InvalidPathError,
  RouteNotFoundError,
} from "./errors.js";
import type {
  LocationConfig,
  SchemaConfig,
  UpstreamConfig,
} from "./schema-config.js";

export interface ProxyRule {
  type: "proxy";
  upstreamId: string;
  upstreamHost: string;
  upstreamPort: number;
  upstreamPathPrefix: string;
}

export interface StaticRule {
  type: "static";
  rootOrAliasDir: string;
  fallbackFile?: string;
  isAlias: boolean;
}

export interface Rule {
  pathPrefix: string;
  kind: ProxyRule | StaticRule;
}

export type RuleSet = readonly Readonly<Rule>[];

/**
 * Resolves the configured locations into an immutable rule set.
 * Upstream ids are looked up once here so dispatch never has to.
 */
export function buildRuleSet(config: SchemaConfig): RuleSet {
  const upstreams = new Map<string, UpstreamConfig>();
  for (const upstream of config.server.upstreams) {
    if (upstreams.has(upstream.id)) {
      throw new ConfigurationError(`Duplicate upstream id: ${upstream.id}`);
    }
    upstreams.set(upstream.id, upstream);
  }

  const seen = new Set<string>();
  const rules: Readonly<Rule>[] = [];
  for (const location of config.server.locations) {
    if (!location.path.startsWith("/")) {
      throw new ConfigurationError(
        `Location path must start with "/": ${location.path}`
      );
    }
    if (seen.has(location.path)) {
      throw new ConfigurationError(`Duplicate location: ${location.path}`);
    }
    seen.add(location.path);

    const kind = Object.freeze(toKind(location, upstreams));
    rules.push(Object.freeze({ pathPrefix: location.path, kind }));
  }

  return Object.freeze(rules);
}

function toKind(
  location: LocationConfig,
  upstreams: Map<string, UpstreamConfig>
): ProxyRule | StaticRule {
  if (location.proxy) {
    const upstreamId = location.proxy.upstream;
    const upstream = upstreams.get(upstreamId);
    if (!upstream) {
      throw new ConfigurationError(
        `Location ${location.path} names unknown upstream: ${upstreamId}`
      );
    }

    const url = new URL(upstream.url);
    if (url.protocol !== "http:") {
      throw new ConfigurationError(
        `Upstream ${upstream.id} must use http:, got ${url.protocol}`
      );
    }

    return {
      type: "proxy",
      upstreamId: upstream.id,
      upstreamHost: url.hostname,
      upstreamPort: url.port ? Number(url.port) : 80,
      upstreamPathPrefix: location.proxy.path ?? location.path,
    };
  }

  if (location.alias !== undefined) {
    return {
      type: "static",
      rootOrAliasDir: location.alias,
      fallbackFile: location.fallback,
      isAlias: true,
    };
  }

  if (location.root !== undefined) {
    return {
      type: "static",
      rootOrAliasDir: location.root,
      fallbackFile: location.fallback,
      isAlias: false,
    };
  }

  throw new ConfigurationError(`Location ${location.path} has no target`);
}

/**
 * Decodes the path, merges repeated slashes and resolves `.` and `..`
 * segments, so locations are matched against what the client meant.
 * A `..` climbing above `/` is refused.
 */
export function normalizeRequestPath(pathname: string): string {
  let decoded: string;
  try {
    decoded = decodeURIComponent(pathname);
  } catch {
    throw new InvalidPathError(pathname);
  }
  if (!decoded.startsWith("/") || decoded.includes("\0")) {
    throw new InvalidPathError(pathname);
  }

  const parts = decoded.split("/").slice(1);
  const segments: string[] = [];
  for (const part of parts) {
    if (part === "" || part === ".") {
      continue;
    }
    if (part === "..") {
      if (segments.length === 0) {
        throw new InvalidPathError(pathname);
      }
      segments.pop();
      continue;
    }
    segments.push(part);
  }

  const last = parts[parts.length - 1];
  const trailingSlash = last === "" || last === "." || last === "..";
  if (segments.length === 0) {
    return "/";
  }
  return `/${segments.join("/")}${trailingSlash ? "/" : ""}`;
}

/**
 * Percent-encodes a normalized path again, one segment at a time.
 */
export function encodeRequestPath(path: string): string {
  return path.split("/").map(encodeURIComponent).join("/");
}

/**
 * Longest matching prefix wins; on equal length the earlier rule is kept.
 */
export function route(ruleSet: RuleSet, path: string): Readonly<Rule> {
  let best: Readonly<Rule> | undefined;
  for (const rule of ruleSet) {
    if (!path.startsWith(rule.pathPrefix)) {
      continue;
    }
    if (!best || rule.pathPrefix.length > best.pathPrefix.length) {
      best = rule;
    }
  }

  if (!best) {
    throw new RouteNotFoundError(path);
  }
  return best;
}

export function describeRule(rule: Readonly<Rule>): string {
  const kind = rule.kind;
  if (kind.type === "proxy") {
    const address = `${kind.upstreamHost}:${kind.upstreamPort}`;
    return `proxy ${kind.upstreamId} (${address})`;
  }
  const mode = kind.isAlias ? "alias" : "root";
  return `${mode} ${kind.rootOrAliasDir}`;
}
