/**
 * Library configuration types, defaults and environment loading.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigurationError } from "../capabilities/errors.js";

export const UtilboxConfigSchema = Type.Object(
  {
    capabilities: Type.Object(
      {
        disabled: Type.Array(Type.String({ minLength: 1 }), {
          description: "Capability names forced unavailable, whatever is installed.",
        }),
      },
      { additionalProperties: false },
    ),
    verbose: Type.Boolean({ description: "Print capability probe details." }),
  },
  { additionalProperties: false },
);

export type UtilboxConfig = Static<typeof UtilboxConfigSchema>;

export const DEFAULT_CONFIG: UtilboxConfig = {
  capabilities: {
    disabled: [],
  },
  verbose: false,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Merge user-supplied partial config with defaults and validate the result.
 * @throws ConfigurationError naming the first invalid field.
 */
export function resolveConfig(raw?: Record<string, unknown>): UtilboxConfig {
  if (!raw) {
    return {
      capabilities: { disabled: [...DEFAULT_CONFIG.capabilities.disabled] },
      verbose: DEFAULT_CONFIG.verbose,
    };
  }
  const defaults = { disabled: [...DEFAULT_CONFIG.capabilities.disabled] };
  // Non-object sections pass through unchanged and fail validation at /capabilities.
  const capabilities =
    raw.capabilities === undefined
      ? defaults
      : isRecord(raw.capabilities)
        ? { ...defaults, ...raw.capabilities }
        : raw.capabilities;
  const merged: unknown = { ...DEFAULT_CONFIG, ...raw, capabilities };
  if (!Value.Check(UtilboxConfigSchema, merged)) {
    const first = Value.Errors(UtilboxConfigSchema, merged).First();
    const where = first?.path || "/";
    const detail = first?.message ?? "invalid value";
    throw new ConfigurationError(`Invalid utilbox config at ${where}: ${detail}`, { path: where });
  }
  return merged;
}

function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
}

function parseFlag(value: string | undefined): boolean {
  const normalized = value?.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes";
}

/**
 * Read configuration from the environment:
 * - `UTILBOX_DISABLE`: comma-separated capability names to force off
 * - `UTILBOX_VERBOSE`: `1`, `true` or `yes`
 */
export function resolveConfigFromEnv(env: NodeJS.ProcessEnv = process.env): UtilboxConfig {
  return resolveConfig({
    capabilities: { disabled: parseList(env.UTILBOX_DISABLE) },
    verbose: parseFlag(env.UTILBOX_VERBOSE),
  });
}
