// Server configuration.

import { z } from "zod";

import { LOG_LEVELS } from "./logging.ts";

const port = z.coerce.number().int().min(0).max(65535);

export const ServerConfigSchema = z
  .object({
    /** Interface the HTTP server binds to. */
    host: z.string().min(1).default("127.0.0.1"),
    /** TCP port; 0 picks a free one. */
    port: port.default(8080),
    /** Prefix in front of /conversations/:id/socket. */
    basePath: z
      .string()
      .default("")
      .refine((value) => value === "" || (value.startsWith("/") && !value.endsWith("/")), {
        message: "basePath must be empty or start with '/' and not end with '/'",
      }),
    /** Keep-alive ping interval for each session. */
    pingIntervalMs: z.coerce.number().int().positive().default(30_000),
    /** Broker events a session may have queued before deliveries fail. */
    mailboxCapacity: z.coerce.number().int().positive().default(256),
    logLevel: z.enum(LOG_LEVELS).default("info"),
  })
  .strict();

export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type ServerConfigInput = z.input<typeof ServerConfigSchema>;

/** Default server configuration. */
export function defaultServerConfig(): ServerConfig {
  return ServerConfigSchema.parse({});
}

/**
 * Validate a configuration object, filling in defaults.
 *
 * @throws ZodError listing every invalid field
 */
export function parseServerConfig(input: unknown): ServerConfig {
  return ServerConfigSchema.parse(input ?? {});
}

const ENV_KEYS = {
  host: "COLLOQUY_HOST",
  port: "COLLOQUY_PORT",
  basePath: "COLLOQUY_BASE_PATH",
  pingIntervalMs: "COLLOQUY_PING_INTERVAL_MS",
  mailboxCapacity: "COLLOQUY_MAILBOX_CAPACITY",
  logLevel: "LOG_LEVEL",
} as const satisfies Record<keyof ServerConfig, string>;

/** Read configuration from environment variables; unset ones use defaults. */
export function serverConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
): ServerConfig {
  const input: Record<string, string> = {};
  for (const [field, key] of Object.entries(ENV_KEYS)) {
    const value = env[key]?.trim();
    if (value) input[field] = field === "logLevel" ? value.toLowerCase() : value;
  }
  return parseServerConfig(input);
}
