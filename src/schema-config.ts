import { z } from "zod";

const upstreamSchema = z.object({
  id: z.string().min(1),
  url: z.url(),
});

// nginx-style size: bare bytes, or a number suffixed with k, m or g
const sizeSchema = z.union([
  z.number().int().nonnegative(),
  z
    .string()
    .regex(/^\s*\d+\s*[kmg]?\s*$/i, "expected a size such as 512k or 10m"),
]);

const proxyTargetSchema = z.object({
  upstream: z.string().min(1),
  path: z.string().startsWith("/").optional(),
});

const locationSchema = z
  .object({
    path: z.string().startsWith("/"),
    proxy: proxyTargetSchema.optional(),
    root: z.string().min(1).optional(),
    alias: z.string().min(1).optional(),
    fallback: z.string().min(1).optional(),
  })
  .refine(
    (location) =>
      [location.proxy, location.root, location.alias].filter(
        (target) => target !== undefined
      ).length === 1,
    { message: "a location needs exactly one of proxy, root or alias" }
  )
  .refine(
    (location) =>
      location.proxy === undefined || location.fallback === undefined,
    { message: "fallback only applies to root and alias locations" }
  );

export const logLevelSchema = z.enum([
  "debug",
  "info",
  "warn",
  "error",
  "silent",
]);

const serverSchema = z.object({
  listen: z.number().int().min(0).max(65535).default(80),
  workers: z.number().int().positive().optional(),
  client_max_body_size: sizeSchema.default("10m"),
  proxy_timeout_ms: z.number().int().positive().default(60_000),
  log_level: logLevelSchema.default("info"),
  upstreams: z.array(upstreamSchema),
  locations: z.array(locationSchema).min(1),
});

export const mainConfigSchema = z.object({
  server: serverSchema,
});

export type SchemaConfig = z.infer<typeof mainConfigSchema>;
export type LocationConfig = z.infer<typeof locationSchema>;
export type UpstreamConfig = z.infer<typeof upstreamSchema>;
export type LogLevel = z.infer<typeof logLevelSchema>;
