/**
 * Capability error types.
 *
 * Only these errors cross the capability layer's boundary. A package that is
 * missing or fails to load is recorded as an unavailable probe result and only
 * becomes an error when `require` is asked to enforce it.
 */

import type { UnavailableKind } from "./types.js";

export const CapabilityErrorCode = {
  CONFIGURATION: "E_CAPABILITY_CONFIG",
  UNAVAILABLE: "E_CAPABILITY_UNAVAILABLE",
  UNKNOWN: "E_CAPABILITY_UNKNOWN",
} as const;

export type CapabilityErrorCode = (typeof CapabilityErrorCode)[keyof typeof CapabilityErrorCode];

export class CapabilityError extends Error {
  constructor(
    message: string,
    public readonly code: CapabilityErrorCode,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "CapabilityError";
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
    };
  }
}

/**
 * Static wiring mistake: malformed descriptor, duplicate registration or
 * invalid configuration. Raised at startup and never retried.
 */
export class ConfigurationError extends CapabilityError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, CapabilityErrorCode.CONFIGURATION, details);
    this.name = "ConfigurationError";
  }

  static duplicate(name: string): ConfigurationError {
    return new ConfigurationError(`Capability "${name}" is already registered`, { name });
  }
}

export class CapabilityUnavailableError extends CapabilityError {
  constructor(
    public readonly capability: string,
    public readonly reason: string,
    public readonly kind: UnavailableKind,
  ) {
    super(`Capability "${capability}" is unavailable: ${reason}`, CapabilityErrorCode.UNAVAILABLE, {
      capability,
      reason,
      kind,
    });
    this.name = "CapabilityUnavailableError";
  }
}

export class UnknownCapabilityError extends CapabilityError {
  constructor(public readonly capability: string) {
    super(`Capability "${capability}" was never registered`, CapabilityErrorCode.UNKNOWN, {
      capability,
    });
    this.name = "UnknownCapabilityError";
  }
}

export function isCapabilityError(err: unknown): err is CapabilityError {
  return err instanceof CapabilityError;
}

export function isCapabilityUnavailable(err: unknown): err is CapabilityUnavailableError {
  return err instanceof CapabilityUnavailableError;
}
