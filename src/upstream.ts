import http from "node:http";
import type { IncomingHttpHeaders, OutgoingHttpHeaders } from "node:http";
import { UpstreamTimeoutError, UpstreamUnreachableError } from "./errors.js";
import type { ProxyRule, Rule } from "./router.js";

const HOP_BY_HOP_HEADERS = new Set([
  "connection",
  "keep-alive",
  "proxy-connection",
  "transfer-encoding",
  "upgrade",
  "te",
  "trailer",
]);

export interface ForwardRequest {
  method: string;
  path: string;
  search: string;
  headers: IncomingHttpHeaders;
  body: Buffer;
  clientAddress?: string;
}

export interface UpstreamResponse {
  status: number;
  headers: OutgoingHttpHeaders;
  body: http.IncomingMessage;
}

/**
 * Swaps the matched location prefix for the upstream one, keeping the query
 * string.
 */
export function rewritePath(
  pathPrefix: string,
  kind: ProxyRule,
  path: string,
  search = ""
): string {
  return kind.upstreamPathPrefix + path.slice(pathPrefix.length) + search;
}

export function stripHopByHop(
  headers: IncomingHttpHeaders
): OutgoingHttpHeaders {
  const result: OutgoingHttpHeaders = {};
  // headers named in `Connection` are hop-by-hop for this hop as well
  const named = new Set(
    String(headers.connection ?? "")
      .split(",")
      .map((name) => name.trim().toLowerCase())
      .filter(Boolean)
  );

  for (const [name, value] of Object.entries(headers)) {
    if (
      value === undefined ||
      HOP_BY_HOP_HEADERS.has(name) ||
      named.has(name)
    ) {
      continue;
    }
    result[name] = value;
  }
  return result;
}

/**
 * Builds the headers sent upstream. `host` is whatever the client sent.
 */
export function buildUpstreamHeaders(
  request: ForwardRequest
): OutgoingHttpHeaders {
  const headers = stripHopByHop(request.headers);

  if (request.headers.host !== undefined) {
    headers.host = request.headers.host;
  }
  if (request.clientAddress) {
    const previous = request.headers["x-forwarded-for"];
    headers["x-real-ip"] = request.clientAddress;
    headers["x-forwarded-for"] = previous
      ? `${previous}, ${request.clientAddress}`
      : request.clientAddress;
  }
  headers["x-forwarded-proto"] = "http";
  // the body was buffered, so it always goes out with a known length
  delete headers["content-length"];
  if (request.body.length > 0 || hasBodySemantics(request.method)) {
    headers["content-length"] = request.body.length;
  }
  return headers;
}

function hasBodySemantics(method: string): boolean {
  return method === "POST" || method === "PUT" || method === "PATCH";
}

export class UpstreamClient {
  private readonly agents = new Map<string, http.Agent>();

  constructor(private readonly timeoutMs: number) {}

  /**
   * Sends the buffered request to the rule's upstream and resolves once the
   * response headers arrive; the body is left for the caller to stream.
   */
  forward(
    rule: Readonly<Rule>,
    kind: ProxyRule,
    request: ForwardRequest
  ): Promise<UpstreamResponse> {
    const target = `${kind.upstreamHost}:${kind.upstreamPort}`;
    const path = rewritePath(
      rule.pathPrefix,
      kind,
      request.path,
      request.search
    );

    return new Promise((resolve, reject) => {
      const upstreamRequest = http.request(
        {
          host: kind.upstreamHost,
          port: kind.upstreamPort,
          method: request.method,
          path,
          headers: buildUpstreamHeaders(request),
          agent: this.agentFor(target),
        },
        (upstreamRes) => {
          upstreamRequest.setTimeout(0);
          resolve({
            status: upstreamRes.statusCode ?? 502,
            headers: stripHopByHop(upstreamRes.headers),
            body: upstreamRes,
          });
        }
      );

      upstreamRequest.setTimeout(this.timeoutMs, () => {
        upstreamRequest.destroy(
          new UpstreamTimeoutError(target, this.timeoutMs)
        );
      });

      upstreamRequest.on("error", (err) => {
        if (err instanceof UpstreamTimeoutError) {
          reject(err);
          return;
        }
        reject(new UpstreamUnreachableError(target, err));
      });

      upstreamRequest.end(request.body);
    });
  }

  close(): void {
    for (const agent of this.agents.values()) {
      agent.destroy();
    }
    this.agents.clear();
  }

  private agentFor(target: string): http.Agent {
    let agent = this.agents.get(target);
    if (!agent) {
      agent = new http.Agent({ keepAlive: true });
      this.agents.set(target, agent);
    }
    return agent;
  }
}
