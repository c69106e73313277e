// src/bootstrap/start-server.ts
// Binds exactly one HTTP listener for an explicitly passed application.

import http from "http";
import type { ServerConfig } from "@/config/app.config";
import {
  InvalidApplicationError,
  PortInUseError,
  ServerStartError,
} from "@/lib/errors/startup.errors";
import { log } from "@/lib/observability/logger";

export type RequestListener = http.RequestListener;

export type ServerState = "listening" | "stopped";

export interface RunningServer {
  readonly address: ServerConfig;
  readonly state: ServerState;
  readonly server: http.Server;
  close(): Promise<void>;
}

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function isRequestListener(value: unknown): value is RequestListener {
  return typeof value === "function";
}

function toStartError(err: unknown, config: ServerConfig): Error {
  const code =
    err instanceof Error && "code" in err ? String(err.code) : undefined;

  if (code === "EADDRINUSE") {
    return new PortInUseError(config.host, config.port);
  }

  const message = err instanceof Error ? err.message : String(err);
  return new ServerStartError(
    `Failed to bind ${config.host}:${config.port}: ${message}`,
    err,
  );
}

/**
 * Resolves once the socket is bound. A rejected start never leaves a
 * listener behind.
 */
export async function startServer(
  app: unknown,
  config: ServerConfig,
): Promise<RunningServer> {
  if (!isRequestListener(app)) {
    throw new InvalidApplicationError(describeValue(app));
  }

  const server = http.createServer(app);

  await new Promise<void>((resolve, reject) => {
    const onError = (err: unknown) => {
      server.removeListener("listening", onListening);
      server.close();
      reject(toStartError(err, config));
    };
    const onListening = () => {
      server.removeListener("error", onError);
      resolve();
    };

    server.once("error", onError);
    server.once("listening", onListening);
    server.listen({ host: config.host, port: config.port });
  });

  server.on("error", (err) => {
    log("ERROR", "HTTP_SERVER_ERROR", { errorMessage: err.message });
  });

  const bound = server.address();
  if (bound === null || typeof bound === "string") {
    server.close();
    throw new ServerStartError(
      `Expected a TCP address after binding ${config.host}:${config.port}`,
    );
  }
  const address: ServerConfig = { host: config.host, port: bound.port };

  let state: ServerState = "listening";
  let closing: Promise<void> | null = null;

  log("INFO", "HTTP_SERVER_LISTENING", { host: address.host, port: address.port });

  return {
    address,
    server,
    get state() {
      return state;
    },
    close() {
      if (closing) return closing;

      closing = new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err) {
            reject(err);
            return;
          }
          state = "stopped";
          log("INFO", "HTTP_SERVER_STOPPED", {
            host: address.host,
            port: address.port,
          });
          resolve();
        });
        server.closeIdleConnections();
      });
      return closing;
    },
  };
}
