export type ProxyErrorCode =
  | "INVALID_CONFIG"
  | "ROUTE_NOT_FOUND"
  | "INVALID_PATH"
  | "FILE_NOT_FOUND"
  | "METHOD_NOT_ALLOWED"
  | "BODY_TOO_LARGE"
  | "UPSTREAM_UNREACHABLE"
  | "UPSTREAM_TIMEOUT";

/**
 * Base class for every failure the router knows how to answer.
 * `status` is the HTTP status written back to the client.
 */
export class ProxyError extends Error {
  constructor(
    public readonly code: ProxyErrorCode,
    public readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "ProxyError";
  }
}

export class ConfigurationError extends ProxyError {
  constructor(message: string) {
    super("INVALID_CONFIG", 500, message);
    this.name = "ConfigurationError";
  }
}

export class RouteNotFoundError extends ProxyError {
  constructor(public readonly path: string) {
    super("ROUTE_NOT_FOUND", 500, `No location matches ${path}`);
    this.name = "RouteNotFoundError";
  }
}

export class InvalidPathError extends ProxyError {
  constructor(public readonly path: string) {
    super("INVALID_PATH", 400, `Invalid path: ${path}`);
    this.name = "InvalidPathError";
  }
}

export class FileNotFoundError extends ProxyError {
  constructor(public readonly path: string) {
    super("FILE_NOT_FOUND", 404, `Not found: ${path}`);
    this.name = "FileNotFoundError";
  }
}

export class MethodNotAllowedError extends ProxyError {
  constructor(
    public readonly method: string,
    public readonly allowed: readonly string[]
  ) {
    super("METHOD_NOT_ALLOWED", 405, `Method ${method} not allowed`);
    this.name = "MethodNotAllowedError";
  }
}

export class BodyTooLargeError extends ProxyError {
  constructor(public readonly limit: number) {
    super("BODY_TOO_LARGE", 413, `Request body exceeds ${limit} bytes`);
    this.name = "BodyTooLargeError";
  }
}

export class UpstreamUnreachableError extends ProxyError {
  constructor(upstream: string, cause: Error) {
    super(
      "UPSTREAM_UNREACHABLE",
      502,
      `Bad Gateway: ${upstream} unreachable (${cause.message})`
    );
    this.name = "UpstreamUnreachableError";
  }
}

export class UpstreamTimeoutError extends ProxyError {
  constructor(upstream: string, timeoutMs: number) {
    super(
      "UPSTREAM_TIMEOUT",
      504,
      `Gateway timeout: ${upstream} did not answer within ${timeoutMs}ms`
    );
    this.name = "UpstreamTimeoutError";
  }
}
