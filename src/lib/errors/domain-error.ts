// src/lib/errors/domain-error.ts
// Base for every failure that maps to a known HTTP status or startup code.

export interface ErrorBody {
  ok: false;
  error: string;
  code: string;
}

export abstract class DomainError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly code: string,
  ) {
    super(message);
  }

  toBody(): ErrorBody {
    return { ok: false, error: this.message, code: this.code };
  }
}
