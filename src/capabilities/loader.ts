import { pathToFileURL } from "node:url";
import { resolve } from "import-meta-resolve";
import type { ModuleNamespace } from "./types.js";

export type ModuleLoader = (id: string) => Promise<ModuleNamespace>;

export type LoadFailure = {
  kind: "not-installed" | "import-failed";
  detail: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function errorCode(err: unknown): string {
  return isRecord(err) && typeof err.code === "string" ? err.code : "";
}

function firstLine(message: string): string {
  const line = message.split("\n", 1)[0]?.trim() ?? "";
  return line.length > 0 ? line : "unknown error";
}

/**
 * Tell a package that is simply absent apart from one that is installed but
 * breaks while loading (a missing transitive dependency, a native add-on built
 * for another platform, a syntax error).
 */
export function classifyLoadError(id: string, err: unknown): LoadFailure {
  const message = err instanceof Error ? err.message : String(err ?? "");
  const code = errorCode(err);
  if (code === "MODULE_NOT_FOUND" || code === "ERR_MODULE_NOT_FOUND") {
    // Node names the missing specifier in quotes; anything else is a nested dependency.
    if (message.includes(`'${id}'`) || message.includes(`"${id}"`)) {
      return { kind: "not-installed", detail: "not installed" };
    }
  }
  return { kind: "import-failed", detail: `import failed with ${firstLine(message)}` };
}

function toNamespace(value: unknown): ModuleNamespace {
  if (isRecord(value)) {
    return value;
  }
  return { default: value };
}

function toParentUrl(from: string | URL): string {
  if (from instanceof URL) {
    return from.href;
  }
  return from.startsWith("file:") ? from : pathToFileURL(from).href;
}

/**
 * Default loader: dynamic `import()` of the package. With `from` (a file path
 * or file URL), the id is resolved with ESM rules relative to that file first,
 * so a host application can point probing at its own node_modules.
 */
export function createModuleLoader(opts: { from?: string | URL } = {}): ModuleLoader {
  const parent = opts.from ? toParentUrl(opts.from) : undefined;
  return async (id) => {
    const target = parent ? resolve(id, parent) : id;
    const mod: unknown = await import(target);
    return toNamespace(mod);
  };
}
