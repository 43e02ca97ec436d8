import { z } from "zod";

import {
  Endpoint,
  LaunchSpec,
  RetryPolicy,
  type GateConfig,
  type SchemaBootstrap,
} from "../contracts/gate";
import { EXIT_CODES, GateError } from "../gates/gate_error";

const DEFAULT_PORTS: Record<string, number> = {
  postgres: 5432,
  postgresql: 5432,
  mysql: 3306,
  mariadb: 3306,
  redis: 6379,
  rediss: 6379,
  mongodb: 27017,
  amqp: 5672,
};

// setTimeout takes at most 2^31 - 1 ms
const MAX_SECONDS = 2_147_483;

const seconds = z.coerce.number().finite().max(MAX_SECONDS);

export const GateEnv = z.object({
  DB_HOST: z.string().trim().min(1).optional(),
  DB_PORT: z.coerce.number().int().min(1).max(65_535).optional(),
  DB_URL: z.string().trim().min(1).optional(),
  WAIT_FOR: z.string().optional(),
  WAIT_INTERVAL_SECONDS: seconds.positive().default(1),
  WAIT_TIMEOUT_SECONDS: z.union([z.literal("unbounded"), seconds.min(0)]).default(60),
  WAIT_CONNECT_TIMEOUT_SECONDS: seconds.positive().optional(),
  DB_SCHEMA_PATH: z.string().trim().min(1).optional(),
  LAUNCH_COMMAND: z.string().trim().min(1).optional(),
});

export type GateEnv = z.infer<typeof GateEnv>;

export type DatabaseTarget =
  | { kind: "network"; endpoint: Endpoint }
  | { kind: "sqlite"; databasePath: string };

type LoadArgs = {
  env: NodeJS.ProcessEnv;
  argv: string[];
};

const configError = (message: string, issues?: string[]) =>
  new GateError({
    code: "configuration_error",
    message,
    exitCode: EXIT_CODES.configuration_error,
    issues,
  });

const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);

const toMs = (value: number) => Math.round(value * 1000);

/**
 * Reads a datastore URL of the form scheme://[user[:pass]@]host[:port]/db.
 * sqlite URLs carry a file path instead of an endpoint: sqlite:///rel.db, sqlite:////abs.db.
 */
export function parseDatabaseUrl(raw: string): DatabaseTarget {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw configError("DB_URL is not a valid URL", [`DB_URL: cannot parse "${raw}"`]);
  }

  // Driver suffixes such as postgresql+asyncpg or sqlite+aiosqlite
  const scheme = url.protocol.replace(/:$/, "").split("+")[0].toLowerCase();

  if (scheme === "sqlite") {
    const databasePath = decodeURIComponent(url.pathname).replace(/^\//, "");
    if (!databasePath) {
      throw configError("DB_URL has no sqlite database path", ["DB_URL: missing database path"]);
    }
    return { kind: "sqlite", databasePath };
  }

  const host = url.hostname.replace(/^\[|\]$/g, "");
  if (!host) {
    throw configError("DB_URL has no host", ["DB_URL: missing host"]);
  }

  const port = url.port ? Number(url.port) : DEFAULT_PORTS[scheme];
  if (port === undefined) {
    throw configError("DB_URL has no port and the scheme has no default", [
      `DB_URL: unknown default port for scheme "${scheme}"`,
    ]);
  }

  return { kind: "network", endpoint: { host, port, label: "db" } };
}

/**
 * Parses "host:port" (IPv6 hosts in brackets: "[::1]:5432").
 */
export function parseEndpoint(raw: string): Endpoint {
  const value = raw.trim();
  const separator = value.lastIndexOf(":");
  const host = value.slice(0, separator).replace(/^\[|\]$/g, "");
  const port = Number(value.slice(separator + 1));

  const parsed = Endpoint.safeParse({ host, port });
  if (separator <= 0 || !parsed.success) {
    throw configError(`Invalid endpoint "${value}"`, [`WAIT_FOR: expected host:port, got "${value}"`]);
  }
  return parsed.data;
}

const cleanEnv = (env: NodeJS.ProcessEnv): Record<string, string> => {
  const entries = Object.entries(env).filter(
    (entry): entry is [string, string] => typeof entry[1] === "string"
  );
  return Object.fromEntries(entries);
};

const resolveCommand = (argv: string[], launchCommand?: string): string[] => {
  const args = argv[0] === "--" ? argv.slice(1) : argv;
  if (args.length > 0) return args;
  return launchCommand ? launchCommand.split(/\s+/) : [];
};

export function loadGateConfig(args: LoadArgs): GateConfig {
  // Empty variables count as unset
  const present = Object.fromEntries(
    Object.entries(args.env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );
  const parsedEnv = GateEnv.safeParse(present);
  if (!parsedEnv.success) {
    throw configError("Invalid gate configuration", formatIssues(parsedEnv.error));
  }
  const env = parsedEnv.data;

  const endpoints: Endpoint[] = [];
  let sqlitePath: string | undefined;

  if (env.DB_HOST) {
    if (env.DB_PORT === undefined) {
      throw configError("DB_PORT is required when DB_HOST is set", ["DB_PORT: required"]);
    }
    endpoints.push({ host: env.DB_HOST, port: env.DB_PORT, label: "db" });
  }

  if (env.DB_URL) {
    const target = parseDatabaseUrl(env.DB_URL);
    if (target.kind === "sqlite") {
      sqlitePath = target.databasePath;
    } else if (!env.DB_HOST) {
      endpoints.push(target.endpoint);
    }
  }

  for (const entry of (env.WAIT_FOR ?? "").split(",")) {
    if (entry.trim()) endpoints.push(parseEndpoint(entry));
  }

  if (endpoints.length === 0 && !sqlitePath) {
    throw configError("No dependency configured", ["DB_HOST, DB_URL or WAIT_FOR must be set"]);
  }

  let schema: SchemaBootstrap | undefined;
  if (env.DB_SCHEMA_PATH) {
    if (!sqlitePath) {
      throw configError("DB_SCHEMA_PATH requires a sqlite DB_URL", [
        "DB_SCHEMA_PATH: only sqlite databases are bootstrapped",
      ]);
    }
    schema = { databasePath: sqlitePath, schemaPath: env.DB_SCHEMA_PATH };
  }

  const intervalMs = toMs(env.WAIT_INTERVAL_SECONDS);
  const timeoutMs =
    env.WAIT_TIMEOUT_SECONDS === "unbounded" || env.WAIT_TIMEOUT_SECONDS === 0
      ? "unbounded"
      : toMs(env.WAIT_TIMEOUT_SECONDS);
  const parsedPolicy = RetryPolicy.safeParse({
    intervalMs,
    timeoutMs,
    connectTimeoutMs: env.WAIT_CONNECT_TIMEOUT_SECONDS
      ? toMs(env.WAIT_CONNECT_TIMEOUT_SECONDS)
      : intervalMs,
  });
  if (!parsedPolicy.success) {
    throw configError("Invalid retry policy", formatIssues(parsedPolicy.error));
  }

  const [command, ...commandArgs] = resolveCommand(args.argv, env.LAUNCH_COMMAND);
  const parsedLaunch = LaunchSpec.safeParse({
    command,
    args: commandArgs,
    env: cleanEnv(args.env),
  });
  if (!parsedLaunch.success) {
    throw configError("No launch command given", [
      "pass the service command after -- or set LAUNCH_COMMAND",
    ]);
  }

  return {
    endpoints,
    policy: parsedPolicy.data,
    launch: parsedLaunch.data,
    ...(schema ? { schema } : {}),
  };
}
