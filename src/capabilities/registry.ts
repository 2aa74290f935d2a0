/**
 * Capability registry: the single source of truth for which optional
 * capabilities this process can use.
 *
 * Probing policy is lazy per name: a capability's packages are loaded the first
 * time that name is resolved, never at registration. `list()` resolves every
 * registered name. Results are cached for the life of the registry.
 */

import { logVerbose } from "../globals.js";
import { createConsoleLogger, type CapabilityLogger } from "../logger.js";
import { validateDescriptor } from "./descriptor.js";
import { ConfigurationError, UnknownCapabilityError } from "./errors.js";
import { createModuleLoader, type ModuleLoader } from "./loader.js";
import { probeCapability } from "./probe.js";
import type { CapabilityDescriptor, CapabilityStatusEntry, ProbeResult } from "./types.js";

export type CapabilityRegistryOptions = {
  loader?: ModuleLoader;
  logger?: CapabilityLogger;
  /** Capability names forced unavailable. Names that are never registered are ignored. */
  disabled?: Iterable<string>;
};

export class CapabilityRegistry {
  private readonly descriptors = new Map<string, CapabilityDescriptor>();
  private readonly results = new Map<string, ProbeResult>();
  private readonly inflight = new Map<string, Promise<ProbeResult>>();
  private readonly loader: ModuleLoader;
  private readonly logger: CapabilityLogger;
  private readonly disabled: ReadonlySet<string>;

  constructor(opts: CapabilityRegistryOptions = {}) {
    this.loader = opts.loader ?? createModuleLoader();
    this.logger = opts.logger ?? createConsoleLogger();
    this.disabled = new Set(opts.disabled ?? []);
  }

  /**
   * Add a descriptor to the known set.
   * @throws ConfigurationError on a malformed descriptor or a name that is already taken.
   */
  register(descriptor: CapabilityDescriptor): void {
    validateDescriptor(descriptor);
    if (this.descriptors.has(descriptor.name)) {
      throw ConfigurationError.duplicate(descriptor.name);
    }
    this.descriptors.set(descriptor.name, descriptor);
  }

  has(name: string): boolean {
    return this.descriptors.has(name);
  }

  /** Registered names, in registration order. */
  names(): string[] {
    return Array.from(this.descriptors.keys());
  }

  describe(name: string): CapabilityDescriptor {
    const descriptor = this.descriptors.get(name);
    if (!descriptor) {
      throw new UnknownCapabilityError(name);
    }
    return descriptor;
  }

  /**
   * Cached probe result for `name`, probing on first use. Concurrent first
   * calls share one probe and all receive the same result object.
   * @throws UnknownCapabilityError when `name` was never registered.
   */
  async resolve(name: string): Promise<ProbeResult> {
    const descriptor = this.describe(name);
    const cached = this.results.get(name);
    if (cached) {
      return cached;
    }
    const pending = this.inflight.get(name);
    if (pending) {
      return pending;
    }

    const probe = probeCapability(descriptor, { loader: this.loader, disabled: this.disabled })
      .then((result) => this.store(name, result))
      .finally(() => {
        if (this.inflight.get(name) === probe) {
          this.inflight.delete(name);
        }
      });
    this.inflight.set(name, probe);
    return probe;
  }

  async isAvailable(name: string): Promise<boolean> {
    const result = await this.resolve(name);
    return result.status === "available";
  }

  /** Cached result without probing; `undefined` until the name has been resolved. */
  peek(name: string): ProbeResult | undefined {
    this.describe(name);
    return this.results.get(name);
  }

  /**
   * Drop the cached result so the next `resolve` probes again.
   *
   * Test-only. Production code must not call this: callers cache availability
   * decisions and do not expect a capability to flip mid-process. Do not call it
   * while other tasks may be resolving the same name.
   */
  refresh(name: string): void {
    this.describe(name);
    this.results.delete(name);
    this.inflight.delete(name);
  }

  /** Status of every registered capability, probing any not yet resolved. */
  async list(): Promise<CapabilityStatusEntry[]> {
    return Promise.all(
      this.names().map(async (name) => {
        const descriptor = this.describe(name);
        const result = await this.resolve(name);
        const entry: CapabilityStatusEntry = {
          name,
          ...(descriptor.summary ? { summary: descriptor.summary } : {}),
          packages: descriptor.requires.map((requirement) => requirement.id),
          status: result.status,
        };
        if (result.status === "unavailable") {
          entry.kind = result.kind;
          entry.reason = result.reason;
        }
        return entry;
      }),
    );
  }

  private store(name: string, result: ProbeResult): ProbeResult {
    const existing = this.results.get(name);
    if (existing) {
      return existing;
    }
    this.results.set(name, result);
    try {
      this.report(name, result);
    } catch (err) {
      logVerbose(`[utilbox] capability logger failed for ${name}: ${String(err)}`);
    }
    return result;
  }

  private report(name: string, result: ProbeResult): void {
    if (result.status === "available") {
      this.logger.debug?.(`capability ${name}: available`);
    } else if (result.kind === "import-failed") {
      this.logger.warn(`capability ${name}: ${result.reason}`);
    } else {
      this.logger.debug?.(`capability ${name}: unavailable (${result.reason})`);
    }
  }
}
