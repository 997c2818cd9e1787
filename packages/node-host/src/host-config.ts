import { z } from "zod";

export const HOST_CONFIG_ENV = "SLIPWAY_HOST_CONFIG";

export const DEFAULT_MAX_PAYLOAD = 16 * 2 ** 20;

export const DEFAULT_MESSAGE_HIGH_WATER_MARK = 64;

export const HostConfigSchema = z.object({
  /** 0 picks a free port */
  port: z.number().int().min(0).max(65535).default(8080),
  host: z.string().min(1).default("127.0.0.1"),
  /** Largest websocket message accepted from a client, in bytes */
  maxPayload: z.number().int().positive().default(DEFAULT_MAX_PAYLOAD),
  /** Unread websocket messages per connection before the socket is paused */
  messageHighWaterMark: z.number().int().positive().default(DEFAULT_MESSAGE_HIGH_WATER_MARK),
});

export type HostConfig = z.infer<typeof HostConfigSchema>;

/**
 * Read the host configuration from `SLIPWAY_HOST_CONFIG` (a JSON object).
 * An unset variable yields the defaults.
 */
export function loadHostConfig(env: NodeJS.ProcessEnv = process.env): HostConfig {
  const raw = env[HOST_CONFIG_ENV];
  if (raw === undefined || raw.trim() === "") {
    return HostConfigSchema.parse({});
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error(`Failed to parse ${HOST_CONFIG_ENV} as JSON`);
  }

  const result = HostConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid ${HOST_CONFIG_ENV}: ${issues}`);
  }
  return result.data;
}
