import { createLogger } from "@slipway/core";
import type { App, Logger } from "@slipway/core";
import { loadHostConfig } from "./host-config";
import { SlipwayServer } from "./server";

export interface ServeOptions {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

/**
 * Start serving `app` with the configuration from `SLIPWAY_HOST_CONFIG`.
 * Stopping the returned server is up to the caller.
 */
export async function serve(app: App, options: ServeOptions = {}): Promise<SlipwayServer> {
  const logger = options.logger ?? createLogger({ prefix: "Slipway" });
  const config = loadHostConfig(options.env);
  logger.info(
    `Config: host=${config.host}, port=${config.port}, maxPayload=${config.maxPayload}, ` +
      `messageHighWaterMark=${config.messageHighWaterMark}`,
  );

  const server = new SlipwayServer(app, { ...config, logger });
  await server.start();
  return server;
}
