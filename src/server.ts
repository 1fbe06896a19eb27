// src/server.ts
import type { Server } from "node:http";
import { pathToFileURL } from "node:url";
import { createApp } from "./app.js";
import { CircuitBreaker } from "./breaker.js";
import { loadConfig, type AppConfig } from "./config.js";
import { ResilientGateway } from "./gateway.js";
import { UndiciTransport, type TransportClient } from "./http.js";
import { attachGatewayLogging, createLogger, type Logger } from "./logger.js";
import { RetryPolicy } from "./retry.js";

/**
 * Build the gateway and its one breaker. Call once per process: the breaker
 * must outlive individual requests.
 */
export function createGateway(config: AppConfig, transport?: TransportClient): ResilientGateway {
  return new ResilientGateway({
    upstream: config.upstream,
    transport:
      transport ??
      new UndiciTransport({
        connectTimeoutMs: config.upstream.connectTimeoutMs,
        readTimeoutMs: config.upstream.readTimeoutMs,
      }),
    retry: new RetryPolicy(config.retry),
    breaker: new CircuitBreaker(config.breaker),
  });
}

export interface RunningServer {
  server: Server;
  close(): Promise<void>;
}

export function startServer(config: AppConfig, logger: Logger): Promise<RunningServer> {
  const transport = new UndiciTransport({
    connectTimeoutMs: config.upstream.connectTimeoutMs,
    readTimeoutMs: config.upstream.readTimeoutMs,
  });
  const gateway = createGateway(config, transport);
  attachGatewayLogging(gateway, logger);

  const app = createApp({ gateway, logger });

  return new Promise((resolve) => {
    const server = app.listen(config.port, () => {
      logger.info({ port: config.port, upstream: config.upstream.baseUrl }, "posts gateway listening");
      resolve({
        server,
        close: async () => {
          await new Promise<void>((r, j) => server.close((err) => (err ? j(err) : r())));
          await transport.close();
        },
      });
    });
  });
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const running = await startServer(config, logger);

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "shutting down");
    running.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, "shutdown failed");
        process.exit(1);
      }
    );
  };
  process.once("SIGTERM", shutdown);
  process.once("SIGINT", shutdown);
}

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  main().catch((e: unknown) => {
    // eslint-disable-next-line no-console
    console.error(e);
    process.exit(1);
  });
}
