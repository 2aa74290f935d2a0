import { describe, expect, it } from "vitest";
import { defineCapability } from "./descriptor.js";
import { ConfigurationError } from "./errors.js";
import { createFakeLoader } from "./loader.test-mocks.js";
import { createCapabilityHandle, probeCapability } from "./probe.js";

const plotting = defineCapability({
  name: "plotting",
  requires: ["chart.js", { id: "chartjs-node-canvas", exports: ["ChartJSNodeCanvas"] }],
});

describe("probeCapability", () => {
  it("returns every namespace in declared order when all packages load", async () => {
    const chart = { Chart: class {} };
    const canvas = { ChartJSNodeCanvas: class {} };
    const { loader, load } = createFakeLoader({ "chart.js": chart, "chartjs-node-canvas": canvas });

    const result = await probeCapability(plotting, { loader });

    expect(result.status).toBe("available");
    if (result.status !== "available") return;
    expect(result.handle.modules.map((entry) => entry.id)).toEqual([
      "chart.js",
      "chartjs-node-canvas",
    ]);
    expect(result.handle.module("chart.js")).toBe(chart);
    expect(result.handle.module("chartjs-node-canvas")).toBe(canvas);
    expect(load.mock.calls.map(([id]) => id)).toEqual(["chart.js", "chartjs-node-canvas"]);
  });

  it("stops at the first missing package", async () => {
    const { loader, load } = createFakeLoader({ "chartjs-node-canvas": { ChartJSNodeCanvas: {} } });

    const result = await probeCapability(plotting, { loader });

    expect(result).toEqual({
      status: "unavailable",
      capability: "plotting",
      kind: "not-installed",
      package: "chart.js",
      reason: 'plotting support needs the optional package "chart.js" (not installed)',
    });
    expect(load).toHaveBeenCalledTimes(1);
  });

  it("records an installed package that throws while loading", async () => {
    const { loader } = createFakeLoader({
      "chart.js": new Error("Unexpected token 'export'"),
    });

    const result = await probeCapability(plotting, { loader });

    expect(result.status).toBe("unavailable");
    if (result.status !== "unavailable") return;
    expect(result.kind).toBe("import-failed");
    expect(result.reason).toBe(
      `plotting support needs the optional package "chart.js" (import failed with Unexpected token 'export')`,
    );
  });

  it("flags a package that lacks a required export as incompatible", async () => {
    const { loader } = createFakeLoader({
      "chart.js": { Chart: {} },
      "chartjs-node-canvas": { CanvasRenderService: {} },
    });

    const result = await probeCapability(plotting, { loader });

    expect(result).toMatchObject({
      status: "unavailable",
      kind: "incompatible",
      package: "chartjs-node-canvas",
      reason:
        'plotting support needs the optional package "chartjs-node-canvas" (version incompatible (missing export "ChartJSNodeCanvas"))',
    });
  });

  it("finds exports on a CommonJS default export", async () => {
    const locking = defineCapability({
      name: "locking",
      requires: [{ id: "proper-lockfile", exports: ["lock"] }],
    });
    const lock = () => undefined;
    const { loader } = createFakeLoader({ "proper-lockfile": { default: { lock } } });

    const result = await probeCapability(locking, { loader });

    expect(result.status).toBe("available");
    if (result.status !== "available") return;
    expect(result.handle.exportOf("proper-lockfile", "lock")).toBe(lock);
  });

  it("skips loading entirely for a disabled capability", async () => {
    const { loader, load } = createFakeLoader({});

    const result = await probeCapability(plotting, { loader, disabled: new Set(["plotting"]) });

    expect(result).toEqual({
      status: "unavailable",
      capability: "plotting",
      kind: "disabled",
      reason: "plotting support is disabled by configuration",
    });
    expect(load).not.toHaveBeenCalled();
  });

  it("uses the descriptor's own message template", async () => {
    const gpu = defineCapability({
      name: "gpu_stats",
      requires: ["systeminformation"],
      unavailableMessage: "no GPU stats: {package} -> {error}",
    });
    const { loader } = createFakeLoader({});

    const result = await probeCapability(gpu, { loader });

    expect(result.status === "unavailable" && result.reason).toBe(
      "no GPU stats: systeminformation -> not installed",
    );
  });

  it("never rejects when the loader throws synchronously", async () => {
    const image = defineCapability({ name: "image", requires: ["sharp"] });
    const loader = () => {
      throw new Error("loader exploded");
    };

    const result = await probeCapability(image, { loader });

    expect(result.status).toBe("unavailable");
  });

  it("returns frozen results", async () => {
    const { loader } = createFakeLoader({});
    const result = await probeCapability(plotting, { loader });
    expect(Object.isFrozen(result)).toBe(true);
  });
});

describe("createCapabilityHandle", () => {
  it("rejects lookups of packages the capability does not require", () => {
    const handle = createCapabilityHandle("git", [{ id: "simple-git", namespace: {} }]);
    expect(() => handle.module("isomorphic-git")).toThrow(ConfigurationError);
    expect(handle.exportOf("simple-git", "simpleGit")).toBeUndefined();
  });
});
