import type { Stats } from "node:fs";
import { open, stat } from "node:fs/promises";
import type { ServerResponse } from "node:http";
import { posix } from "node:path";
import { pipeline } from "node:stream/promises";
import {
  FileNotFoundError,
  InvalidPathError,
  MethodNotAllowedError,
} from "./errors.js";
import type { Rule, StaticRule } from "./router.js";

const ALLOWED_METHODS = ["GET", "HEAD"] as const;
const DIRECTORY_INDEX = "index.html";
const FIRST_CHUNK_SIZE = 64 * 1024;

export interface StaticFile {
  filePath: string;
  stats: Stats;
}

/**
 * Maps a normalized request path onto the filesystem.
 *
 * alias: the matched prefix is replaced by the directory
 * (`/media/a.jpg` -> `<alias>/a.jpg`).
 * root: the whole path is appended to the directory
 * (`/api/docs/` -> `<root>/api/docs/`).
 */
export function resolveStaticPath(
  pathPrefix: string,
  kind: StaticRule,
  path: string
): string {
  const relative = kind.isAlias ? path.slice(pathPrefix.length) : path;

  const candidate = posix.join(kind.rootOrAliasDir, relative);
  const fromRoot = posix.relative(kind.rootOrAliasDir, candidate);
  if (fromRoot === ".." || fromRoot.startsWith("../")) {
    throw new InvalidPathError(path);
  }
  return candidate;
}

/**
 * Looks for the file to serve: the exact path, then the directory index,
 * then the location's fallback document.
 */
export async function findStaticFile(
  rule: Readonly<Rule>,
  kind: StaticRule,
  path: string
): Promise<StaticFile> {
  const candidate = resolveStaticPath(rule.pathPrefix, kind, path);

  const exact = await statSafe(candidate);
  if (exact?.isFile()) {
    return { filePath: candidate, stats: exact };
  }

  if (exact?.isDirectory()) {
    const indexPath = posix.join(candidate, DIRECTORY_INDEX);
    const index = await statSafe(indexPath);
    if (index?.isFile()) {
      return { filePath: indexPath, stats: index };
    }
  }

  if (kind.fallbackFile) {
    const fallbackPath = posix.join(kind.rootOrAliasDir, kind.fallbackFile);
    const fallback = await statSafe(fallbackPath);
    if (fallback?.isFile()) {
      return { filePath: fallbackPath, stats: fallback };
    }
  }

  throw new FileNotFoundError(path);
}

/**
 * Nothing is written to `response` until the file has been opened and its
 * first chunk read, so a failing file still leaves room for an error status.
 */
export async function serveStaticFile(
  method: string,
  rule: Readonly<Rule>,
  kind: StaticRule,
  path: string,
  response: ServerResponse
): Promise<StaticFile> {
  if (!ALLOWED_METHODS.some((allowed) => allowed === method)) {
    throw new MethodNotAllowedError(method, ALLOWED_METHODS);
  }

  const file = await findStaticFile(rule, kind, path);
  const handle = await open(file.filePath, "r");

  try {
    const first = Buffer.alloc(
      Math.max(1, Math.min(file.stats.size, FIRST_CHUNK_SIZE))
    );
    const { bytesRead } = await handle.read(first, 0, first.length, 0);

    response.statusCode = 200;
    response.setHeader("content-type", contentTypeFor(file.filePath));
    // files such as those under /proc report a size they don't have
    if (bytesRead <= file.stats.size) {
      response.setHeader("content-length", file.stats.size);
    }
    response.setHeader("last-modified", file.stats.mtime.toUTCString());

    if (method === "HEAD") {
      response.end();
      return file;
    }

    response.write(first.subarray(0, bytesRead));
    if (bytesRead < first.length) {
      response.end();
      return file;
    }

    await pipeline(
      handle.createReadStream({ start: bytesRead, autoClose: false }),
      response
    );
    return file;
  } finally {
    await handle.close();
  }
}

export function contentTypeFor(filePath: string): string {
  const extension = posix.extname(filePath).toLowerCase();

  switch (extension) {
    case ".html":
      return "text/html; charset=utf-8";
    case ".css":
      return "text/css; charset=utf-8";
    case ".js":
      return "application/javascript; charset=utf-8";
    case ".json":
      return "application/json; charset=utf-8";
    case ".txt":
      return "text/plain; charset=utf-8";
    case ".webmanifest":
      return "application/manifest+json; charset=utf-8";
    case ".svg":
      return "image/svg+xml";
    case ".png":
      return "image/png";
    case ".jpg":
    case ".jpeg":
      return "image/jpeg";
    case ".gif":
      return "image/gif";
    case ".webp":
      return "image/webp";
    case ".ico":
      return "image/x-icon";
    case ".woff2":
      return "font/woff2";
    default:
      return "application/octet-stream";
  }
}

async function statSafe(path: string): Promise<Stats | undefined> {
  try {
    return await stat(path);
  } catch {
    return undefined;
  }
}
