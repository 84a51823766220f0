import cluster from "node:cluster";
import http from "node:http";
import { pipeline } from "node:stream/promises";
import { parseSize, validateConfiguration } from "./config.js";
import {
  InvalidPathError,
  MethodNotAllowedError,
  ProxyError,
} from "./errors.js";
import { Logger } from "./logger.js";
import { assertContentLength, readRequestBody } from "./request-body.js";
import {
  buildRuleSet,
  describeRule,
  encodeRequestPath,
  normalizeRequestPath,
  route,
  type RuleSet,
} from "./router.js";
import type { SchemaConfig } from "./schema-config.js";
import { serveStaticFile } from "./static-files.js";
import { WorkerSupervisor } from "./supervisor.js";
import { UpstreamClient } from "./upstream.js";

interface configParams {
  port: number;
  workers: number;
  config: SchemaConfig;
  logger: Logger;
}

export interface ProxyServerOptions {
  ruleSet: RuleSet;
  maxBodySize: number;
  upstreams: UpstreamClient;
  logger: Logger;
}

/**
 * Starts the router. With more than one worker the primary only forks and
 * supervises; every worker builds its own rule set and shares the listen
 * port.
 */
export async function createCustomServer(
  params: configParams
): Promise<http.Server | undefined> {
  const { workers, logger } = params;

  if (workers > 1 && cluster.isPrimary) {
    logger.info(`Primary ${process.pid} forking ${workers} workers`);

    const supervisor = new WorkerSupervisor({
      logger,
      fork: () => {
        cluster.fork({
          config: JSON.stringify(params.config),
        });
      },
      exit: (code) => {
        for (const worker of Object.values(cluster.workers ?? {})) {
          worker?.kill();
        }
        process.exit(code);
      },
    });

    cluster.on("listening", (worker) => supervisor.onListening(worker.id));
    cluster.on("exit", (worker, code, signal) =>
      supervisor.onExit({
        id: worker.id,
        pid: worker.process.pid,
        code,
        signal,
        exitedAfterDisconnect: worker.exitedAfterDisconnect,
      })
    );
    supervisor.start(workers);
    return undefined;
  }

  // forked workers get the validated config from the primary
  const config = cluster.isWorker
    ? await validateConfiguration(`${process.env.config}`)
    : params.config;
  const workerLogger = cluster.isWorker
    ? logger.child(`worker ${process.pid}`)
    : logger;

  const server = createProxyServer({
    ruleSet: buildRuleSet(config),
    maxBodySize: parseSize(config.server.client_max_body_size),
    upstreams: new UpstreamClient(config.server.proxy_timeout_ms),
    logger: workerLogger,
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(params.port, () => {
      server.off("error", reject);
      resolve();
    });
  });
  workerLogger.info(`Server listening on port ${params.port}`);
  return server;
}

export function createProxyServer(options: ProxyServerOptions): http.Server {
  const server = http.createServer((req, res) => {
    void handleRequest(options, req, res);
  });

  server.on("close", () => options.upstreams.close());
  return server;
}

export async function handleRequest(
  options: ProxyServerOptions,
  req: http.IncomingMessage,
  res: http.ServerResponse
): Promise<void> {
  const { logger } = options;
  const started = Date.now();
  const method = req.method ?? "GET";
  let pathname = req.url ?? "/";
  let target = "-";

  try {
    const url = parseRequestUrl(pathname);
    pathname = normalizeRequestPath(url.pathname);

    // the body limit applies before any routing decision is acted on
    assertContentLength(req.headers, options.maxBodySize);

    const rule = route(options.ruleSet, pathname);
    target = describeRule(rule);
    const kind = rule.kind;

    if (kind.type === "static") {
      await readRequestBody(req, options.maxBodySize);
      const file = await serveStaticFile(method, rule, kind, pathname, res);
      target = file.filePath;
    } else {
      const body = await readRequestBody(req, options.maxBodySize);
      const upstream = await options.upstreams.forward(rule, kind, {
        method,
        path: encodeRequestPath(pathname),
        search: url.search,
        headers: req.headers,
        body,
        clientAddress: req.socket.remoteAddress,
      });

      res.writeHead(upstream.status, upstream.headers);
      await pipeline(upstream.body, res);
    }
  } catch (err) {
    writeError(logger, res, err);
  } finally {
    const elapsed = Date.now() - started;
    logger.info(
      `${method} ${pathname} -> ${res.statusCode} ${target} ${elapsed}ms`
    );
  }
}

/**
 * Origin-form targets (`/path?query`) are the norm; absolute-form ones are
 * accepted too.
 */
export function parseRequestUrl(target: string): URL {
  try {
    return target.startsWith("/")
      ? new URL(`http://localhost${target}`)
      : new URL(target);
  } catch {
    throw new InvalidPathError(target);
  }
}

function writeError(
  logger: Logger,
  res: http.ServerResponse,
  err: unknown
): void {
  if (res.headersSent || res.destroyed) {
    // the status line is gone, all that is left is to cut the connection
    logger.error(`Response aborted: ${describeError(err)}`);
    res.destroy();
    return;
  }

  // drop whatever a half-done static response had already set
  for (const name of res.getHeaderNames()) {
    res.removeHeader(name);
  }

  if (err instanceof ProxyError) {
    if (err.status >= 500) {
      logger.error(`${err.name}: ${err.message}`);
    } else {
      logger.debug(`${err.name}: ${err.message}`);
    }

    if (err instanceof MethodNotAllowedError) {
      res.setHeader("allow", err.allowed.join(", "));
    }
    if (err.code === "BODY_TOO_LARGE") {
      // the unread body is still on the socket
      res.setHeader("connection", "close");
    }
    res.writeHead(err.status, { "content-type": "text/plain; charset=utf-8" });
    res.end(`${err.message}\n`);
    return;
  }

  logger.error(`Unhandled error: ${describeError(err)}`);
  res.writeHead(500, { "content-type": "text/plain; charset=utf-8" });
  res.end("Internal Server Error\n");
}

function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.stack ?? err.message;
  }
  return String(err);
}
