import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const configSchema = z
  .object({
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    STORE_DRIVER: z.enum(["memory", "postgres"]).default("memory"),
    DATABASE_URL: z.string().url().optional(),
    LOG_COMMANDS: booleanFlag.default("true"),
  })
  .superRefine((env, ctx) => {
    if (env.STORE_DRIVER === "postgres" && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["DATABASE_URL"],
        message: "DATABASE_URL is required when STORE_DRIVER=postgres",
      });
    }
  });

export type PlatformConfig = {
  env: "development" | "test" | "production";
  store: { driver: "memory" } | { driver: "postgres"; databaseUrl: string };
  logCommands: boolean;
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Read the platform configuration from environment variables.
 * dotenv is loaded by the process entrypoint only, never here.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PlatformConfig {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const parsed = result.data;
  return {
    env: parsed.NODE_ENV,
    store:
      parsed.STORE_DRIVER === "postgres" && parsed.DATABASE_URL
        ? { driver: "postgres", databaseUrl: parsed.DATABASE_URL }
        : { driver: "memory" },
    logCommands: parsed.LOG_COMMANDS,
  };
}
