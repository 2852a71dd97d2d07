/**
 * @vision-assistant/server
 *
 * Hono server for the image question-answering page and its JSON API
 */

import { serve, type ServerType } from "@hono/node-server";
import { createLogger } from "@vision-assistant/shared/logger";
import { shutdown } from "@vision-assistant/shared/shutdown";
import type { AddressInfo } from "node:net";
import { createApp } from "./app/app.js";
import type { AppConfig } from "./config/app-config.js";

export type Env = {
  Variables: {
    requestId: string;
    startTime: number;
  };
};

const logger = createLogger("server");

export interface StartedServer {
  server: ServerType;
  port: number;
}

export async function startServer(config: AppConfig): Promise<StartedServer> {
  const app = createApp({ config });

  const { server, port } = await new Promise<StartedServer>(resolve => {
    const server = serve({ fetch: app.fetch, port: config.port }, (info: AddressInfo) => {
      resolve({ server, port: info.port });
    });
  });

  logger.info(`Server started on http://127.0.0.1:${port}`, {
    module: "server:lifecycle",
    port,
  });

  shutdown.register(
    "hono-server",
    async () => {
      await new Promise<void>((resolve, reject) => {
        server.close(err => (err ? reject(err) : resolve()));
      });
      logger.info("Hono server closed", { module: "server:lifecycle" });
    },
    10
  );

  return { server, port };
}

export { createApp } from "./app/app.js";
export { ConfigError, loadConfig, type AppConfig } from "./config/app-config.js";
