import { ConfigurationError } from "./errors.js";
import type {
  CapabilityDescriptor,
  CapabilityDescriptorInput,
  PackageRequirement,
} from "./types.js";

export const DEFAULT_UNAVAILABLE_MESSAGE =
  '{capability} support needs the optional package "{package}" ({error})';

const CAPABILITY_NAME_RE = /^[a-z][a-z0-9_.-]*$/;

function normalizeRequirement(entry: string | PackageRequirement): PackageRequirement {
  if (typeof entry === "string") {
    return { id: entry.trim() };
  }
  return {
    id: entry.id.trim(),
    ...(entry.exports ? { exports: [...entry.exports] } : {}),
  };
}

/**
 * Check a descriptor's static shape. Throws ConfigurationError on the first
 * problem; a valid descriptor passes through untouched.
 */
export function validateDescriptor(descriptor: CapabilityDescriptor): void {
  const { name } = descriptor;
  if (!name) {
    throw new ConfigurationError("Capability name is required");
  }
  if (!CAPABILITY_NAME_RE.test(name)) {
    throw new ConfigurationError(
      `Capability name "${name}" must match ${CAPABILITY_NAME_RE.source}`,
      { name },
    );
  }
  if (descriptor.requires.length === 0) {
    throw new ConfigurationError(`Capability "${name}" must require at least one package`, {
      name,
    });
  }
  const seen = new Set<string>();
  for (const requirement of descriptor.requires) {
    if (!requirement.id.trim()) {
      throw new ConfigurationError(`Capability "${name}" has a blank package id`, { name });
    }
    if (seen.has(requirement.id)) {
      throw new ConfigurationError(
        `Capability "${name}" requires package "${requirement.id}" more than once`,
        { name, package: requirement.id },
      );
    }
    seen.add(requirement.id);
    for (const exportName of requirement.exports ?? []) {
      if (!exportName.trim()) {
        throw new ConfigurationError(
          `Capability "${name}" lists a blank export for package "${requirement.id}"`,
          { name, package: requirement.id },
        );
      }
    }
  }
  if (!descriptor.unavailableMessage.trim()) {
    throw new ConfigurationError(`Capability "${name}" has an empty unavailable message`, {
      name,
    });
  }
}

/**
 * Build a frozen capability descriptor.
 *
 * @example
 * const plotting = defineCapability({
 *   name: "plotting",
 *   summary: "Render charts to PNG",
 *   requires: ["chart.js", { id: "chartjs-node-canvas", exports: ["ChartJSNodeCanvas"] }],
 * });
 */
export function defineCapability(input: CapabilityDescriptorInput): CapabilityDescriptor {
  const requires = input.requires.map((entry) => Object.freeze(normalizeRequirement(entry)));
  const descriptor: CapabilityDescriptor = Object.freeze({
    name: input.name.trim(),
    ...(input.summary ? { summary: input.summary } : {}),
    requires: Object.freeze(requires),
    unavailableMessage: input.unavailableMessage ?? DEFAULT_UNAVAILABLE_MESSAGE,
  });
  validateDescriptor(descriptor);
  return descriptor;
}

/** Fill `{capability}`, `{package}` and `{error}`; other placeholders are left as written. */
export function formatUnavailableMessage(
  template: string,
  values: { capability: string; package: string; error: string },
): string {
  return template.replace(/\{(capability|package|error)\}/g, (_match, key: string) => {
    if (key === "capability") return values.capability;
    if (key === "package") return values.package;
    return values.error;
  });
}
