import { z } from "zod";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

const envSchema = z.object({
  ONE_RULE_LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export interface OneRuleConfig {
  logLevel: (typeof LOG_LEVELS)[number];
}

/**
 * Read configuration from an environment object. Throws when a variable holds
 * a value outside its allowed set.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): OneRuleConfig {
  const parsed = envSchema.safeParse({
    // Treat blank variables as unset
    ONE_RULE_LOG_LEVEL: env.ONE_RULE_LOG_LEVEL?.trim() || undefined,
  });

  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }

  return { logLevel: parsed.data.ONE_RULE_LOG_LEVEL };
}

let cachedConfig: OneRuleConfig | undefined;

export function getConfig(): OneRuleConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = undefined;
}
