import { z } from "zod";

/**
 * Boolean schema that accepts string "true"/"false" or boolean values
 */
const BooleanSchema = (fallback: boolean) =>
  z.union([z.boolean(), z.string().transform((s) => s === "true")]).default(fallback);

const configSchema = z.object({
  // Log level for the pino logger; "silent" turns logging off (tests)
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("warn"),

  // One-line human readable log output instead of JSON lines
  LOG_PRETTY: BooleanSchema(true),

  // Contacts file used when the CLI is not given --contacts
  VOSUMMARY_CONTACTS_FILE: z.string().min(1).optional(),
});

export type Config = z.infer<typeof configSchema>;

let cachedConfig: Config | undefined;

export function getConfig(env: NodeJS.ProcessEnv = process.env): Config {
  if (!cachedConfig) {
    cachedConfig = configSchema.parse({
      LOG_LEVEL: env.LOG_LEVEL || undefined,
      LOG_PRETTY: env.LOG_PRETTY || undefined,
      VOSUMMARY_CONTACTS_FILE: env.VOSUMMARY_CONTACTS_FILE || undefined,
    });
  }
  return cachedConfig;
}

/**
 * Reset the cached config (useful for testing)
 */
export function resetConfig(): void {
  cachedConfig = undefined;
}
