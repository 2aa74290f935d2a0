import { formatUnavailableMessage } from "./descriptor.js";
import { ConfigurationError } from "./errors.js";
import { classifyLoadError, type ModuleLoader } from "./loader.js";
import type {
  AvailableResult,
  CapabilityDescriptor,
  CapabilityHandle,
  LoadedModule,
  ModuleNamespace,
  ProbeResult,
  UnavailableKind,
  UnavailableResult,
} from "./types.js";

export type ProbeOptions = {
  loader: ModuleLoader;
  /** Capabilities forced unavailable by configuration. */
  disabled?: ReadonlySet<string>;
};

function readExport(namespace: ModuleNamespace, name: string): unknown {
  if (name in namespace) {
    return namespace[name];
  }
  const fallback = namespace.default;
  if ((typeof fallback === "object" && fallback !== null) || typeof fallback === "function") {
    const value: unknown = Reflect.get(fallback, name);
    return value;
  }
  return undefined;
}

export function createCapabilityHandle(
  capability: string,
  modules: readonly LoadedModule[],
): CapabilityHandle {
  const byId = new Map(modules.map((entry) => [entry.id, entry.namespace]));
  const module = (id: string): ModuleNamespace => {
    const namespace = byId.get(id);
    if (!namespace) {
      throw new ConfigurationError(`Capability "${capability}" does not require package "${id}"`, {
        capability,
        package: id,
      });
    }
    return namespace;
  };
  return Object.freeze({
    capability,
    modules: Object.freeze([...modules]),
    module,
    exportOf: (id: string, name: string) => readExport(module(id), name),
  });
}

function unavailable(
  descriptor: CapabilityDescriptor,
  kind: UnavailableKind,
  packageId: string,
  error: string,
): UnavailableResult {
  const result: UnavailableResult = {
    status: "unavailable",
    capability: descriptor.name,
    kind,
    package: packageId,
    reason: formatUnavailableMessage(descriptor.unavailableMessage, {
      capability: descriptor.name,
      package: packageId,
      error,
    }),
  };
  return Object.freeze(result);
}

/**
 * Load a capability's packages in declared order, stopping at the first one
 * that fails. Never rejects: every load failure is returned as data.
 */
export async function probeCapability(
  descriptor: CapabilityDescriptor,
  opts: ProbeOptions,
): Promise<ProbeResult> {
  if (opts.disabled?.has(descriptor.name)) {
    const result: UnavailableResult = {
      status: "unavailable",
      capability: descriptor.name,
      kind: "disabled",
      reason: `${descriptor.name} support is disabled by configuration`,
    };
    return Object.freeze(result);
  }

  const modules: LoadedModule[] = [];
  for (const requirement of descriptor.requires) {
    let namespace: ModuleNamespace;
    try {
      namespace = await opts.loader(requirement.id);
    } catch (err) {
      const failure = classifyLoadError(requirement.id, err);
      return unavailable(descriptor, failure.kind, requirement.id, failure.detail);
    }
    const missing = (requirement.exports ?? []).find(
      (name) => readExport(namespace, name) === undefined,
    );
    if (missing) {
      return unavailable(
        descriptor,
        "incompatible",
        requirement.id,
        `version incompatible (missing export "${missing}")`,
      );
    }
    modules.push(Object.freeze({ id: requirement.id, namespace }));
  }

  const result: AvailableResult = {
    status: "available",
    capability: descriptor.name,
    handle: createCapabilityHandle(descriptor.name, modules),
  };
  return Object.freeze(result);
}
