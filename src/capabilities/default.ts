/**
 * Process-wide default registry, built on first use from the environment and
 * the built-in catalog. Code that wants isolation (tests, embedded hosts)
 * constructs its own CapabilityRegistry instead.
 */

import { resolveConfigFromEnv } from "../config/config.js";
import { setVerbose } from "../globals.js";
import { GatedAccessor } from "./accessor.js";
import { BUILTIN_CAPABILITIES } from "./catalog.js";
import { CapabilityRegistry } from "./registry.js";
import type {
  CapabilityDescriptor,
  CapabilityHandle,
  CapabilityStatusEntry,
} from "./types.js";

let defaultRegistry: CapabilityRegistry | undefined;
let defaultAccessor: GatedAccessor | undefined;

export function getDefaultRegistry(): CapabilityRegistry {
  if (!defaultRegistry) {
    const config = resolveConfigFromEnv();
    if (config.verbose) {
      setVerbose(true);
    }
    const registry = new CapabilityRegistry({ disabled: config.capabilities.disabled });
    for (const descriptor of BUILTIN_CAPABILITIES) {
      registry.register(descriptor);
    }
    defaultRegistry = registry;
  }
  return defaultRegistry;
}

export function getDefaultAccessor(): GatedAccessor {
  if (!defaultAccessor) {
    defaultAccessor = new GatedAccessor(getDefaultRegistry());
  }
  return defaultAccessor;
}

export function registerCapability(descriptor: CapabilityDescriptor): void {
  getDefaultRegistry().register(descriptor);
}

export function isAvailable(name: string): Promise<boolean> {
  return getDefaultRegistry().isAvailable(name);
}

export function requireCapability(name: string): Promise<CapabilityHandle> {
  return getDefaultAccessor().require(name);
}

export function tryRequireCapability(name: string): Promise<CapabilityHandle | null> {
  return getDefaultAccessor().tryRequire(name);
}

export function listCapabilities(): Promise<CapabilityStatusEntry[]> {
  return getDefaultRegistry().list();
}
