import assert from "node:assert/strict";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import http from "node:http";
import { once } from "node:events";
import type { AddressInfo } from "node:net";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { after, afterEach, before, test } from "node:test";
import { InvalidPathError } from "../errors.js";
import { Logger } from "../logger.js";
import { buildRuleSet } from "../router.js";
import type { LocationConfig, SchemaConfig } from "../schema-config.js";
import {
  createCustomServer,
  createProxyServer,
  parseRequestUrl,
} from "../server.js";
import { UpstreamClient, stripHopByHop } from "../upstream.js";

interface CapturedRequest {
  method: string;
  url: string;
  headers: http.IncomingHttpHeaders;
  body: string;
}

interface ClientResponse {
  status: number;
  headers: http.IncomingHttpHeaders;
  body: string;
}

interface SendOptions {
  method?: string;
  path: string;
  headers?: http.OutgoingHttpHeaders;
  body?: string;
  chunked?: boolean;
}

interface RouterOptions {
  maxBodySize?: number;
  timeoutMs?: number;
  locations?: LocationConfig[];
}

let staticDir: string;
const openServers: http.Server[] = [];

before(async () => {
  staticDir = await mkdtemp(join(tmpdir(), "path-router-server-"));
  await mkdir(join(staticDir, "media"), { recursive: true });
  await writeFile(join(staticDir, "index.html"), "<div id=root></div>");
  await writeFile(join(staticDir, "media", "foo.jpg"), "jpeg-bytes");
});

after(async () => {
  await rm(staticDir, { recursive: true, force: true });
});

afterEach(async () => {
  for (const server of openServers.splice(0)) {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
});

async function listen(server: http.Server): Promise<number> {
  openServers.push(server);
  server.listen(0, "127.0.0.1");
  await once(server, "listening");
  return (server.address() as AddressInfo).port;
}

async function startUpstream(): Promise<{
  port: number;
  captured: CapturedRequest[];
}> {
  const captured: CapturedRequest[] = [];
  const server = http.createServer((req, res) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => {
      captured.push({
        method: req.method ?? "",
        url: req.url ?? "",
        headers: req.headers,
        body: Buffer.concat(chunks).toString("utf8"),
      });
      res.writeHead(201, {
        "content-type": "application/json",
        "x-upstream": "backend",
      });
      res.end(JSON.stringify({ id: 7 }));
    });
  });
  return { port: await listen(server), captured };
}

function routerConfig(
  upstreamPort: number,
  locations: LocationConfig[] = [
    { path: "/api/", proxy: { upstream: "backend", path: "/api/" } },
    { path: "/admin/", proxy: { upstream: "backend", path: "/admin/" } },
    { path: "/media/", alias: `${join(staticDir, "media")}/` },
    { path: "/", alias: `${staticDir}/`, fallback: "index.html" },
  ]
): SchemaConfig {
  return {
    server: {
      listen: 0,
      client_max_body_size: "10m",
      proxy_timeout_ms: 60_000,
      log_level: "silent",
      upstreams: [
        { id: "backend", url: `http://127.0.0.1:${upstreamPort}` },
      ],
      locations,
    },
  };
}

async function startRouter(
  upstreamPort: number,
  options: RouterOptions = {}
): Promise<number> {
  const server = createProxyServer({
    ruleSet: buildRuleSet(routerConfig(upstreamPort, options.locations)),
    maxBodySize: options.maxBodySize ?? 10 * 1024 * 1024,
    upstreams: new UpstreamClient(options.timeoutMs ?? 60_000),
    logger: new Logger("silent"),
  });
  return listen(server);
}

function send(
  port: number,
  options: SendOptions
): Promise<ClientResponse> {
  return new Promise((resolve, reject) => {
    const req = http.request(
      {
        host: "127.0.0.1",
        port,
        method: options.method ?? "GET",
        path: options.path,
        headers: options.headers,
        agent: false,
      },
      (res) => {
        const chunks: Buffer[] = [];
        res.on("data", (chunk: Buffer) => chunks.push(chunk));
        res.on("end", () =>
          resolve({
            status: res.statusCode ?? 0,
            headers: res.headers,
            body: Buffer.concat(chunks).toString("utf8"),
          })
        );
        res.on("error", reject);
      }
    );
    req.on("error", reject);

    if (options.body !== undefined && options.chunked) {
      req.write(options.body);
      req.end();
    } else {
      req.end(options.body);
    }
  });
}

async function closedPort(): Promise<number> {
  const server = http.createServer();
  server.listen(0, "127.0.0.1");
  await once(server, "listening");
  const { port } = server.address() as AddressInfo;
  await new Promise<void>((resolve) => server.close(() => resolve()));
  return port;
}

test("admin requests keep the client's Host header and path", async () => {
  const upstream = await startUpstream();
  const routerPort = await startRouter(upstream.port);

  const response = await send(routerPort, {
    path: "/admin/users",
    headers: { host: "example.com" },
  });

  assert.equal(response.status, 201);
  assert.equal(response.headers["x-upstream"], "backend");
  assert.equal(response.body, JSON.stringify({ id: 7 }));
  assert.equal(upstream.captured.length, 1);
  assert.equal(upstream.captured[0].url, "/admin/users");
  assert.equal(upstream.captured[0].headers.host, "example.com");
  assert.equal(upstream.captured[0].headers["x-real-ip"], "127.0.0.1");
  assert.equal(upstream.captured[0].headers["x-forwarded-for"], "127.0.0.1");
  assert.equal(upstream.captured[0].headers["x-forwarded-proto"], "http");
});

test("api requests forward method, query string and body", async () => {
  const upstream = await startUpstream();
  const routerPort = await startRouter(upstream.port);

  const response = await send(routerPort, {
    method: "POST",
    path: "/api/recipes/?page=2",
    headers: { host: "foodgram.test", "content-type": "application/json" },
    body: '{"name":"pie"}',
  });

  assert.equal(response.status, 201);
  const [forwarded] = upstream.captured;
  assert.deepEqual(
    { method: forwarded.method, url: forwarded.url, body: forwarded.body },
    { method: "POST", url: "/api/recipes/?page=2", body: '{"name":"pie"}' }
  );
  assert.equal(forwarded.headers["content-type"], "application/json");
  assert.equal(forwarded.headers["content-length"], "14");
});

test("a declared body over the limit never reaches the upstream", async () => {
  const upstream = await startUpstream();
  const routerPort = await startRouter(upstream.port, { maxBodySize: 16 });

  const response = await send(routerPort, {
    method: "POST",
    path: "/api/recipes/",
    body: "x".repeat(32),
  });

  assert.equal(response.status, 413);
  assert.equal(response.body, "Request body exceeds 16 bytes\n");
  assert.equal(upstream.captured.length, 0);
});

test("a chunked body over the limit never reaches the upstream", async () => {
  const upstream = await startUpstream();
  const routerPort = await startRouter(upstream.port, { maxBodySize: 16 });

  const response = await send(routerPort, {
    method: "POST",
    path: "/api/recipes/",
    body: "x".repeat(32),
    chunked: true,
  });

  assert.equal(response.status, 413);
  assert.equal(upstream.captured.length, 0);
});

test("the body limit also guards static locations", async () => {
  const upstream = await startUpstream();
  const routerPort = await startRouter(upstream.port, { maxBodySize: 16 });

  const response = await send(routerPort, {
    method: "POST",
    path: "/media/foo.jpg",
    body: "x".repeat(32),
  });

  assert.equal(response.status, 413);
});

test("an unreachable upstream answers 502", async () => {
  const routerPort = await startRouter(await closedPort());

  const response = await send(routerPort, { path: "/api/recipes/" });

  assert.equal(response.status, 502);
  assert.match(response.body, /^Bad Gateway: 127\.0\.0\.1:\d+ unreachable/);
});

test("an upstream that never answers times out with 504", async () => {
  const silent = http.createServer(() => {
    // holds every request open
  });
  const silentPort = await listen(silent);
  const routerPort = await startRouter(silentPort, { timeoutMs: 100 });

  const response = await send(routerPort, { path: "/api/recipes/" });

  assert.equal(response.status, 504);
  assert.equal(
    response.body,
    `Gateway timeout: 127.0.0.1:${silentPort} did not answer within 100ms\n`
  );
});

test("unknown paths fall back to the index document", async () => {
  const upstream = await startUpstream();
  const routerPort = await startRouter(upstream.port);

  const response = await send(routerPort, { path: "/nonexistent" });

  assert.equal(response.status, 200);
  assert.equal(response.headers["content-type"], "text/html; charset=utf-8");
  assert.equal(response.body, "<div id=root></div>");
  assert.equal(upstream.captured.length, 0);
});

test("media files are served from the alias directory", async () => {
  const upstream = await startUpstream();
  const routerPort = await startRouter(upstream.port);

  const response = await send(routerPort, { path: "/media/foo.jpg" });

  assert.equal(response.status, 200);
  assert.equal(response.headers["content-type"], "image/jpeg");
  assert.equal(response.headers["content-length"], "10");
  assert.equal(response.body, "jpeg-bytes");
});

test("HEAD on a static file sends headers only", async () => {
  const upstream = await startUpstream();
  const routerPort = await startRouter(upstream.port);

  const response = await send(routerPort, {
    method: "HEAD",
    path: "/media/foo.jpg",
  });

  assert.equal(response.status, 200);
  assert.equal(response.headers["content-length"], "10");
  assert.equal(response.body, "");
});

test("missing media without a fallback answers 404", async () => {
  const upstream = await startUpstream();
  const routerPort = await startRouter(upstream.port);

  const response = await send(routerPort, { path: "/media/missing.jpg" });

  assert.equal(response.status, 404);
  assert.equal(response.body, "Not found: /media/missing.jpg\n");
});

test("static locations only accept GET and HEAD", async () => {
  const upstream = await startUpstream();
  const routerPort = await startRouter(upstream.port);

  const response = await send(routerPort, {
    method: "DELETE",
    path: "/media/foo.jpg",
  });

  assert.equal(response.status, 405);
  assert.equal(response.headers.allow, "GET, HEAD");
});

test("encoded and doubled-slash paths reach the api upstream", async () => {
  const upstream = await startUpstream();
  const routerPort = await startRouter(upstream.port);

  const encoded = await send(routerPort, { path: "/%61pi/recipes/" });
  const doubled = await send(routerPort, { path: "//api/recipes/?page=3" });

  assert.equal(encoded.status, 201);
  assert.equal(doubled.status, 201);
  assert.deepEqual(
    upstream.captured.map((request) => request.url),
    ["/api/recipes/", "/api/recipes/?page=3"]
  );
});

test("a path climbing above the root answers 400", async () => {
  const upstream = await startUpstream();
  const routerPort = await startRouter(upstream.port);

  const response = await send(routerPort, { path: "/media/..%2F..%2Fetc" });

  assert.equal(response.status, 400);
  assert.equal(response.body, "Invalid path: /media/..%2F..%2Fetc\n");
  assert.equal(upstream.captured.length, 0);
});

test(
  "a file that fails to read answers 500 instead of a cut connection",
  { skip: process.platform !== "linux" },
  async () => {
    const upstream = await startUpstream();
    // reading /proc/self/mem from offset 0 fails with EIO
    const routerPort = await startRouter(upstream.port, {
      locations: [{ path: "/", alias: "/proc/self/" }],
    });

    const response = await send(routerPort, { path: "/mem" });

    assert.equal(response.status, 500);
    assert.equal(
      response.headers["content-type"],
      "text/plain; charset=utf-8"
    );
    assert.equal(response.headers["last-modified"], undefined);
    assert.equal(response.body, "Internal Server Error\n");
  }
);

test("a single-process server listens and routes requests", async () => {
  const upstream = await startUpstream();
  const server = await createCustomServer({
    port: 0,
    workers: 1,
    config: routerConfig(upstream.port),
    logger: new Logger("silent"),
  });
  assert.ok(server);
  openServers.push(server);

  const { port } = server.address() as AddressInfo;
  const response = await send(port, { path: "/api/recipes/" });

  assert.equal(response.status, 201);
  assert.equal(response.body, JSON.stringify({ id: 7 }));
  assert.equal(upstream.captured[0].url, "/api/recipes/");
});

test("starting on a port already in use rejects", async () => {
  const blocker = http.createServer();
  openServers.push(blocker);
  blocker.listen(0);
  await once(blocker, "listening");
  const { port } = blocker.address() as AddressInfo;

  await assert.rejects(
    createCustomServer({
      port,
      workers: 1,
      config: routerConfig(port),
      logger: new Logger("silent"),
    }),
    (err: unknown) =>
      err instanceof Error && "code" in err && err.code === "EADDRINUSE"
  );
});

test("hop-by-hop headers and the ones Connection names are dropped", () => {
  assert.deepEqual(
    stripHopByHop({
      connection: "keep-alive, x-trace",
      "keep-alive": "timeout=5",
      "transfer-encoding": "chunked",
      "x-trace": "1",
      accept: "application/json",
      host: "example.com",
    }),
    { accept: "application/json", host: "example.com" }
  );
});

test("request targets are parsed in origin and absolute form", () => {
  assert.equal(
    parseRequestUrl("/api/recipes/?page=2").pathname,
    "/api/recipes/"
  );
  assert.equal(
    parseRequestUrl("/static/../media/a.jpg").pathname,
    "/media/a.jpg"
  );
  assert.equal(parseRequestUrl("//api/x").pathname, "//api/x");
  assert.equal(parseRequestUrl("http://example.com/s/abc").pathname, "/s/abc");
  assert.throws(() => parseRequestUrl("not a url"), InvalidPathError);
});
