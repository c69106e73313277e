// src/lib/errors/startup.errors.ts
// Failures raised before the listener is bound. The entrypoint maps every one of them to exit code 1.

import { DomainError } from "./domain-error";

export class ConfigError extends DomainError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`, 500, "CONFIG_INVALID");
    this.name = "ConfigError";
  }
}

export class ManifestReadError extends DomainError {
  constructor(
    public readonly manifestPath: string,
    reason: string,
  ) {
    super(
      `Cannot read dependency manifest ${manifestPath}: ${reason}`,
      500,
      "MANIFEST_UNREADABLE",
    );
    this.name = "ManifestReadError";
  }
}

export class MissingDependencyError extends DomainError {
  constructor(public readonly missing: string[]) {
    super(
      `Declared dependencies are not installed: ${missing.join(", ")}`,
      500,
      "DEPENDENCY_MISSING",
    );
    this.name = "MissingDependencyError";
  }
}

export class InvalidApplicationError extends DomainError {
  constructor(received: string) {
    super(
      `Application must be a request handler function. Got: ${received}`,
      500,
      "APPLICATION_INVALID",
    );
    this.name = "InvalidApplicationError";
  }
}

export class PortInUseError extends DomainError {
  constructor(
    public readonly host: string,
    public readonly port: number,
  ) {
    super(`Port ${port} is already in use on ${host}`, 500, "PORT_IN_USE");
    this.name = "PortInUseError";
  }
}

export class ServerStartError extends DomainError {
  constructor(
    message: string,
    public readonly reason?: unknown,
  ) {
    super(message, 500, "SERVER_START_FAILED");
    this.name = "ServerStartError";
  }
}
