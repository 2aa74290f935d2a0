/** Module namespace object as returned by a dynamic `import()`. */
export type ModuleNamespace = Readonly<Record<string, unknown>>;

export type PackageRequirement = {
  /** npm package identifier, passed to the module loader as written. */
  id: string;
  /** Named exports the installed version must provide. */
  exports?: readonly string[];
};

export type CapabilityDescriptor = {
  readonly name: string;
  readonly summary?: string;
  readonly requires: readonly Readonly<PackageRequirement>[];
  /** Template with `{capability}`, `{package}` and `{error}` placeholders. */
  readonly unavailableMessage: string;
};

export type CapabilityDescriptorInput = {
  name: string;
  summary?: string;
  requires: readonly (string | PackageRequirement)[];
  unavailableMessage?: string;
};

export type LoadedModule = {
  readonly id: string;
  readonly namespace: ModuleNamespace;
};

export type CapabilityHandle = {
  readonly capability: string;
  readonly modules: readonly LoadedModule[];
  /** Namespace of one required package. */
  module(id: string): ModuleNamespace;
  /** Named export of one required package, looking through a CommonJS `default`. */
  exportOf(id: string, name: string): unknown;
};

export type UnavailableKind = "not-installed" | "import-failed" | "incompatible" | "disabled";

export type AvailableResult = {
  readonly status: "available";
  readonly capability: string;
  readonly handle: CapabilityHandle;
};

export type UnavailableResult = {
  readonly status: "unavailable";
  readonly capability: string;
  readonly kind: UnavailableKind;
  readonly reason: string;
  /** Package that failed; absent when the capability was disabled by configuration. */
  readonly package?: string;
};

export type ProbeResult = AvailableResult | UnavailableResult;

export type CapabilityStatus = ProbeResult["status"];

export type CapabilityStatusEntry = {
  name: string;
  summary?: string;
  packages: string[];
  status: CapabilityStatus;
  kind?: UnavailableKind;
  reason?: string;
};
