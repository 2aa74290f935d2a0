import { describe, expect, it, vi } from "vitest";
import type { CapabilityLogger } from "../logger.js";
import { defineCapability } from "./descriptor.js";
import { ConfigurationError, UnknownCapabilityError } from "./errors.js";
import { createFakeLoader } from "./loader.test-mocks.js";
import { CapabilityRegistry } from "./registry.js";

function createLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies CapabilityLogger;
}

const plotting = defineCapability({ name: "plotting", requires: ["chart.js"] });
const locking = defineCapability({ name: "locking", requires: ["proper-lockfile"] });
const gpuStats = defineCapability({ name: "gpu_stats", requires: ["systeminformation"] });

describe("CapabilityRegistry.register", () => {
  it("rejects a duplicate name and keeps the first descriptor", () => {
    const registry = new CapabilityRegistry({ loader: createFakeLoader({}).loader });
    registry.register(plotting);

    const second = defineCapability({ name: "plotting", requires: ["vega"] });
    expect(() => registry.register(second)).toThrow(ConfigurationError);
    expect(() => registry.register(second)).toThrow('Capability "plotting" is already registered');
    expect(registry.describe("plotting")).toBe(plotting);
  });

  it("rejects a malformed hand-written descriptor", () => {
    const registry = new CapabilityRegistry({ loader: createFakeLoader({}).loader });
    expect(() =>
      registry.register({ name: "image", requires: [], unavailableMessage: "{package}" }),
    ).toThrow(ConfigurationError);
    expect(registry.has("image")).toBe(false);
  });

  it("does not probe at registration time", () => {
    const { loader, load } = createFakeLoader({});
    const registry = new CapabilityRegistry({ loader });
    registry.register(plotting);
    expect(load).not.toHaveBeenCalled();
    expect(registry.peek("plotting")).toBeUndefined();
  });

  it("lists names in registration order", () => {
    const registry = new CapabilityRegistry({ loader: createFakeLoader({}).loader });
    registry.register(locking);
    registry.register(plotting);
    expect(registry.names()).toEqual(["locking", "plotting"]);
  });
});

describe("CapabilityRegistry.resolve", () => {
  it("reports a missing package as unavailable with the package in the reason", async () => {
    const registry = new CapabilityRegistry({
      loader: createFakeLoader({}).loader,
      logger: createLogger(),
    });
    registry.register(plotting);

    expect(await registry.isAvailable("plotting")).toBe(false);
    expect(await registry.list()).toEqual([
      {
        name: "plotting",
        packages: ["chart.js"],
        status: "unavailable",
        kind: "not-installed",
        reason: 'plotting support needs the optional package "chart.js" (not installed)',
      },
    ]);
  });

  it("probes once and returns the identical result on later calls", async () => {
    const { loader, load } = createFakeLoader({ "proper-lockfile": { lock: () => undefined } });
    const registry = new CapabilityRegistry({ loader, logger: createLogger() });
    registry.register(locking);

    const first = await registry.resolve("locking");
    const second = await registry.resolve("locking");

    expect(second).toBe(first);
    expect(registry.peek("locking")).toBe(first);
    expect(load).toHaveBeenCalledTimes(1);
  });

  it("caches unavailable results too", async () => {
    const { loader, load } = createFakeLoader({});
    const registry = new CapabilityRegistry({ loader, logger: createLogger() });
    registry.register(plotting);

    const first = await registry.resolve("plotting");
    expect(await registry.resolve("plotting")).toBe(first);
    expect(load).toHaveBeenCalledTimes(1);
  });

  it("shares one probe between concurrent first-time callers", async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const load = vi.fn(async (id: string) => {
      await gate;
      throw Object.assign(new Error(`Cannot find package '${id}' imported from /srv/app.js`), {
        code: "ERR_MODULE_NOT_FOUND",
      });
    });
    const registry = new CapabilityRegistry({ loader: load, logger: createLogger() });
    registry.register(gpuStats);

    const pending = [registry.resolve("gpu_stats"), registry.resolve("gpu_stats")];
    release();
    const [a, b] = await Promise.all(pending);

    expect(a).toBe(b);
    expect(a?.status).toBe("unavailable");
    expect(load).toHaveBeenCalledTimes(1);
    expect(registry.names()).toEqual(["gpu_stats"]);
    expect(registry.peek("gpu_stats")).toBe(a);
  });

  it("raises UnknownCapabilityError for a name that was never registered", async () => {
    const registry = new CapabilityRegistry({ loader: createFakeLoader({}).loader });
    await expect(registry.resolve("plotting")).rejects.toBeInstanceOf(UnknownCapabilityError);
    await expect(registry.isAvailable("plotting")).rejects.toThrow(
      'Capability "plotting" was never registered',
    );
    expect(() => registry.peek("plotting")).toThrow(UnknownCapabilityError);
  });

  it("never loads packages of a disabled capability", async () => {
    const { loader, load } = createFakeLoader({ "proper-lockfile": {} });
    const registry = new CapabilityRegistry({
      loader,
      disabled: ["locking", "not-registered"],
      logger: createLogger(),
    });
    registry.register(locking);

    const result = await registry.resolve("locking");

    expect(result).toMatchObject({ status: "unavailable", kind: "disabled" });
    expect(load).not.toHaveBeenCalled();
  });
});

describe("CapabilityRegistry.refresh", () => {
  it("forces the next resolve to probe again", async () => {
    const modules: Record<string, Record<string, unknown>> = {};
    const load = vi.fn(async (id: string) => {
      const mod = modules[id];
      if (!mod) {
        throw Object.assign(new Error(`Cannot find package '${id}'`), {
          code: "ERR_MODULE_NOT_FOUND",
        });
      }
      return mod;
    });
    const registry = new CapabilityRegistry({ loader: load, logger: createLogger() });
    registry.register(locking);

    expect(await registry.isAvailable("locking")).toBe(false);
    modules["proper-lockfile"] = { lock: () => undefined };
    expect(await registry.isAvailable("locking")).toBe(false);

    registry.refresh("locking");
    expect(registry.peek("locking")).toBeUndefined();
    expect(await registry.isAvailable("locking")).toBe(true);
    expect(load).toHaveBeenCalledTimes(2);
  });

  it("rejects unknown names", () => {
    const registry = new CapabilityRegistry({ loader: createFakeLoader({}).loader });
    expect(() => registry.refresh("locking")).toThrow(UnknownCapabilityError);
  });
});

describe("CapabilityRegistry.list", () => {
  it("reports every capability in registration order with summaries", async () => {
    const git = defineCapability({
      name: "git",
      summary: "Repository state",
      requires: ["simple-git"],
    });
    const registry = new CapabilityRegistry({
      loader: createFakeLoader({ "simple-git": { simpleGit: () => ({}) } }).loader,
      disabled: ["locking"],
      logger: createLogger(),
    });
    registry.register(git);
    registry.register(locking);

    expect(await registry.list()).toEqual([
      {
        name: "git",
        summary: "Repository state",
        packages: ["simple-git"],
        status: "available",
      },
      {
        name: "locking",
        packages: ["proper-lockfile"],
        status: "unavailable",
        kind: "disabled",
        reason: "locking support is disabled by configuration",
      },
    ]);
  });
});

describe("CapabilityRegistry logging", () => {
  it("warns when an installed package fails to import", async () => {
    const logger = createLogger();
    const registry = new CapabilityRegistry({
      loader: createFakeLoader({ "chart.js": new Error("native binding missing") }).loader,
      logger,
    });
    registry.register(plotting);

    await registry.resolve("plotting");

    expect(logger.warn).toHaveBeenCalledWith(
      'capability plotting: plotting support needs the optional package "chart.js" (import failed with native binding missing)',
    );
  });

  it("logs plain absence at debug level only", async () => {
    const logger = createLogger();
    const registry = new CapabilityRegistry({ loader: createFakeLoader({}).loader, logger });
    registry.register(plotting);

    await registry.resolve("plotting");

    expect(logger.warn).not.toHaveBeenCalled();
    expect(logger.debug).toHaveBeenCalledWith(
      'capability plotting: unavailable (plotting support needs the optional package "chart.js" (not installed))',
    );
  });

  it("still returns the stored result when the logger throws", async () => {
    const logger = createLogger();
    logger.warn.mockImplementation(() => {
      throw new Error("log sink closed");
    });
    const registry = new CapabilityRegistry({
      loader: createFakeLoader({ "chart.js": new Error("native binding missing") }).loader,
      logger,
    });
    registry.register(plotting);

    const result = await registry.resolve("plotting");

    expect(result).toMatchObject({ status: "unavailable", kind: "import-failed" });
    expect(registry.peek("plotting")).toBe(result);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});
