import { vi } from "vitest";
import type { ModuleLoader } from "./loader.js";
import type { ModuleNamespace } from "./types.js";

/** Error shaped like Node's ESM resolver failure for a missing package. */
export function moduleNotFoundError(id: string, importer = "/srv/app/index.js"): Error {
  return Object.assign(new Error(`Cannot find package '${id}' imported from ${importer}`), {
    code: "ERR_MODULE_NOT_FOUND",
  });
}

/**
 * In-process stand-in for the dynamic-import loader. Ids mapped to an Error
 * reject with it; ids not listed reject as "not installed".
 */
export function createFakeLoader(modules: Record<string, ModuleNamespace | Error>) {
  const load = vi.fn(async (id: string): Promise<ModuleNamespace> => {
    const entry = modules[id];
    if (entry instanceof Error) {
      throw entry;
    }
    if (!entry) {
      throw moduleNotFoundError(id);
    }
    return entry;
  });
  const loader: ModuleLoader = load;
  return { loader, load };
}
