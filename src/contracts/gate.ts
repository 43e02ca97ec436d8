import { z } from "zod";

export const Endpoint = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65_535),
  // Dependency name for logs (db, redis, ...)
  label: z.string().min(1).optional(),
});

export type Endpoint = z.infer<typeof Endpoint>;

export const RetryPolicy = z
  .object({
    intervalMs: z.number().int().positive(),
    timeoutMs: z.union([z.number().int().positive(), z.literal("unbounded")]),
    connectTimeoutMs: z.number().int().positive(),
  })
  .refine((policy) => policy.timeoutMs === "unbounded" || policy.timeoutMs >= policy.intervalMs, {
    message: "timeout must be at least the retry interval",
    path: ["timeoutMs"],
  });

export type RetryPolicy = z.infer<typeof RetryPolicy>;

export const LaunchSpec = z.object({
  command: z.string().min(1),
  args: z.array(z.string()),
  env: z.record(z.string(), z.string()),
});

export type LaunchSpec = z.infer<typeof LaunchSpec>;

export type SchemaBootstrap = {
  databasePath: string;
  schemaPath: string;
};

export type GateConfig = {
  endpoints: Endpoint[];
  policy: RetryPolicy;
  launch: LaunchSpec;
  schema?: SchemaBootstrap;
};

export type WaitOutcome =
  | { status: "ready"; attempts: number; elapsedMs: number }
  | { status: "timed_out"; attempts: number; elapsedMs: number };

export type GateState = "waiting" | "ready" | "launched" | "timed_out";

export type GateLogger = {
  info: (obj: Record<string, unknown>, msg?: string) => void;
  warn: (obj: Record<string, unknown>, msg?: string) => void;
  error: (obj: Record<string, unknown>, msg?: string) => void;
};

export const formatEndpoint = (endpoint: Endpoint): string =>
  endpoint.label
    ? `${endpoint.label}@${endpoint.host}:${endpoint.port}`
    : `${endpoint.host}:${endpoint.port}`;
