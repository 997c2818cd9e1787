import { z } from "zod";
import type { Logger } from "./logger";

export const DEFAULT_MAX_BODY_SIZE = 10 * 2 ** 20;

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

export const AppConfigSchema = z.object({
  maxBodySize: z.number().int().positive().default(DEFAULT_MAX_BODY_SIZE),
  logLevel: LogLevelSchema.default("info"),
  logPrefix: z.string().min(1).default("Slipway"),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/** Options accepted by `toApp`. Plain values are validated with `AppConfigSchema`. */
export interface AppOptions extends Partial<AppConfig> {
  /** Diagnostic sink; built from `logLevel`/`logPrefix` when absent. */
  logger?: Logger;
  /** Runs when the host sends `lifespan.startup`. */
  onStartup?: () => Promise<void> | void;
  /** Runs when the host sends `lifespan.shutdown`. */
  onShutdown?: () => Promise<void> | void;
}

export function parseAppConfig(options: AppOptions = {}): AppConfig {
  return AppConfigSchema.parse({
    maxBodySize: options.maxBodySize,
    logLevel: options.logLevel,
    logPrefix: options.logPrefix,
  });
}
