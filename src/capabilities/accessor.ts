import { CapabilityUnavailableError } from "./errors.js";
import type { CapabilityRegistry } from "./registry.js";
import type { CapabilityHandle } from "./types.js";

/**
 * Gated accessor: the only sanctioned way a utility surface obtains the
 * packages behind its capability. Surfaces call this once at the top of each
 * entry point and can be written as if the dependency always exists below it.
 */
export class GatedAccessor {
  constructor(readonly registry: CapabilityRegistry) {}

  /**
   * Handle of an available capability.
   * @throws CapabilityUnavailableError with the stored reason when it is not available.
   * @throws UnknownCapabilityError when `name` was never registered.
   */
  async require(name: string): Promise<CapabilityHandle> {
    const result = await this.registry.resolve(name);
    if (result.status === "unavailable") {
      throw new CapabilityUnavailableError(name, result.reason, result.kind);
    }
    return result.handle;
  }

  /** Same handle as `require`, or `null` for callers with a fallback path. */
  async tryRequire(name: string): Promise<CapabilityHandle | null> {
    const result = await this.registry.resolve(name);
    return result.status === "available" ? result.handle : null;
  }

  isAvailable(name: string): Promise<boolean> {
    return this.registry.isAvailable(name);
  }
}
