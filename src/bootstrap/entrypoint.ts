// src/bootstrap/entrypoint.ts
// Startup sequence: config → dependency preflight → app → bind. Nothing is bound if an earlier step fails.

import { createApp } from "@/app";
import { loadConfig, type AppConfig } from "@/config/app.config";
import { verifyDependencyManifest } from "./dependency-manifest";
import { startServer, type RunningServer } from "./start-server";
import { describeError, log } from "@/lib/observability/logger";
import { DomainError } from "@/lib/errors/domain-error";

export interface EntrypointDeps {
  env: NodeJS.ProcessEnv;
  cwd: string;
  checkManifest: (manifestPath: string) => void;
  buildApp: (config: AppConfig) => unknown;
  start: (app: unknown, config: AppConfig["server"]) => Promise<RunningServer>;
}

const defaultDeps: EntrypointDeps = {
  env: process.env,
  cwd: process.cwd(),
  checkManifest: (manifestPath) => {
    verifyDependencyManifest({ manifestPath });
  },
  buildApp: (config) => createApp(config),
  start: startServer,
};

export async function runEntrypoint(
  overrides: Partial<EntrypointDeps> = {},
): Promise<RunningServer> {
  const deps: EntrypointDeps = { ...defaultDeps, ...overrides };

  const config = loadConfig(deps.env, deps.cwd);

  if (config.skipManifestCheck) {
    log("WARN", "DEPENDENCY_PREFLIGHT_SKIPPED", { manifestPath: config.manifestPath });
  } else {
    deps.checkManifest(config.manifestPath);
    log("INFO", "DEPENDENCY_PREFLIGHT_PASSED", { manifestPath: config.manifestPath });
  }

  const app = deps.buildApp(config);
  return deps.start(app, config.server);
}

export type ShutdownSignal = "SIGINT" | "SIGTERM";

export interface SignalSource {
  once(signal: ShutdownSignal, listener: () => void): unknown;
  removeListener(signal: ShutdownSignal, listener: () => void): unknown;
}

/**
 * First signal closes the listener and exits 0 (1 if close fails).
 * Returns a function that removes the handlers.
 */
export function registerShutdown(
  running: RunningServer,
  opts: {
    signals?: ShutdownSignal[];
    target?: SignalSource;
    exit?: (code: number) => void;
  } = {},
): () => void {
  const signals = opts.signals ?? ["SIGINT", "SIGTERM"];
  const target: SignalSource = opts.target ?? process;
  const exit = opts.exit ?? ((code: number) => process.exit(code));

  const handlers = signals.map((signal) => {
    const handler = () => {
      unregister();
      log("INFO", "SHUTDOWN_REQUESTED", { signal });
      running.close().then(
        () => exit(0),
        (err: unknown) => {
          log("ERROR", "SHUTDOWN_FAILED", describeError(err));
          exit(1);
        },
      );
    };
    target.once(signal, handler);
    return { signal, handler };
  });

  function unregister() {
    for (const { signal, handler } of handlers) {
      target.removeListener(signal, handler);
    }
  }

  return unregister;
}

export interface ProcessHooks {
  run?: () => Promise<RunningServer>;
  register?: (running: RunningServer) => void;
  exit?: (code: number) => void;
}

/**
 * Process-level wrapper: a failed start is logged once as STARTUP_FAILED and
 * exits 1; nothing is listening at that point.
 */
export async function runProcess(hooks: ProcessHooks = {}): Promise<RunningServer | null> {
  const run = hooks.run ?? (() => runEntrypoint());
  const register = hooks.register ?? ((running: RunningServer) => registerShutdown(running));
  const exit = hooks.exit ?? ((code: number) => process.exit(code));

  try {
    const running = await run();
    register(running);
    return running;
  } catch (err) {
    log("ERROR", "STARTUP_FAILED", {
      code: err instanceof DomainError ? err.code : "UNEXPECTED",
      ...describeError(err),
    });
    exit(1);
    return null;
  }
}
