/**
 * utilbox
 *
 * Source entrypoint: the capability layer, its configuration and the
 * reference utility surfaces.
 */

// ==================== Capability layer ====================

export type {
  CapabilityDescriptor,
  CapabilityDescriptorInput,
  CapabilityHandle,
  CapabilityStatus,
  CapabilityStatusEntry,
  LoadedModule,
  ModuleNamespace,
  PackageRequirement,
  ProbeResult,
  AvailableResult,
  UnavailableResult,
  UnavailableKind,
} from "./capabilities/types.js";

export {
  DEFAULT_UNAVAILABLE_MESSAGE,
  defineCapability,
  formatUnavailableMessage,
  validateDescriptor,
} from "./capabilities/descriptor.js";
export {
  classifyLoadError,
  createModuleLoader,
  type LoadFailure,
  type ModuleLoader,
} from "./capabilities/loader.js";
export { createCapabilityHandle, probeCapability, type ProbeOptions } from "./capabilities/probe.js";
export { CapabilityRegistry, type CapabilityRegistryOptions } from "./capabilities/registry.js";
export { GatedAccessor } from "./capabilities/accessor.js";
export { BUILTIN_CAPABILITIES } from "./capabilities/catalog.js";
export {
  getDefaultAccessor,
  getDefaultRegistry,
  isAvailable,
  listCapabilities,
  registerCapability,
  requireCapability,
  tryRequireCapability,
} from "./capabilities/default.js";
export {
  renderCapabilityReport,
  summarizeCapabilities,
  type CapabilitySummary,
} from "./capabilities/report.js";

// ==================== Errors ====================

export {
  CapabilityError,
  CapabilityErrorCode,
  CapabilityUnavailableError,
  ConfigurationError,
  UnknownCapabilityError,
  isCapabilityError,
  isCapabilityUnavailable,
} from "./capabilities/errors.js";

// ==================== Configuration & logging ====================

export {
  DEFAULT_CONFIG,
  UtilboxConfigSchema,
  resolveConfig,
  resolveConfigFromEnv,
  type UtilboxConfig,
} from "./config/config.js";
export { createConsoleLogger, silentLogger, type CapabilityLogger } from "./logger.js";
export { isVerbose, logVerbose, setVerbose } from "./globals.js";

// ==================== Utility surfaces ====================

export { describeRepository, type RepositoryInfo } from "./surfaces/git.js";
export { stripToAscii, transliterate } from "./surfaces/transliterate.js";
