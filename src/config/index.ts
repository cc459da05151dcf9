import { z } from "zod";

const configSchema = z.object({
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),

  /** Caddy admin API client settings. */
  caddy: z
    .object({
      /** Upper bound on a single admin API exchange, in milliseconds. */
      requestTimeoutMs: z.coerce.number().int().positive().default(10_000),
      /** Server used when a ProxyRoute does not name one. */
      defaultServerName: z.string().min(1).default("srv0"),
    })
    .default({
      requestTimeoutMs: 10_000,
      defaultServerName: "srv0",
    }),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Parse configuration from an environment map. Unset variables fall back to
 * their defaults; invalid values throw.
 */
export function parseConfig(env: NodeJS.ProcessEnv): Config {
  return configSchema.parse({
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    caddy: {
      requestTimeoutMs: env.CADDY_REQUEST_TIMEOUT_MS,
      defaultServerName: env.CADDY_DEFAULT_SERVER,
    },
  });
}

export const config = parseConfig(process.env);
