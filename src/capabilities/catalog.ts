import { defineCapability } from "./descriptor.js";
import type { CapabilityDescriptor } from "./types.js";

export const BUILTIN_CAPABILITIES: readonly CapabilityDescriptor[] = [
  defineCapability({
    name: "image",
    summary: "Image decoding, resizing and encoding.",
    requires: [{ id: "sharp", exports: ["default"] }],
  }),
  defineCapability({
    name: "plotting",
    summary: "Server-side chart rendering to PNG.",
    requires: ["chart.js", { id: "chartjs-node-canvas", exports: ["ChartJSNodeCanvas"] }],
  }),
  defineCapability({
    name: "vision",
    summary: "Computer-vision helpers backed by OpenCV.",
    requires: ["@techstark/opencv-js"],
  }),
  defineCapability({
    name: "gpu_stats",
    summary: "GPU model, memory and utilisation readings.",
    requires: [{ id: "systeminformation", exports: ["graphics"] }],
  }),
  defineCapability({
    name: "git",
    summary: "Repository state for run metadata (HEAD, branch, dirty tree).",
    requires: [{ id: "simple-git", exports: ["simpleGit"] }],
  }),
  defineCapability({
    name: "locking",
    summary: "Advisory file locks between processes.",
    requires: [{ id: "proper-lockfile", exports: ["lock", "unlock"] }],
  }),
  defineCapability({
    name: "process",
    summary: "CPU and memory usage of running processes.",
    requires: ["pidusage"],
  }),
  defineCapability({
    name: "caching",
    summary: "Bounded in-memory caches for computed values.",
    requires: [{ id: "lru-cache", exports: ["LRUCache"] }],
  }),
  defineCapability({
    name: "transliteration",
    summary: "Unicode to ASCII transliteration.",
    requires: [{ id: "transliteration", exports: ["transliterate"] }],
    unavailableMessage:
      'transliteration falls back to stripping accents; install "{package}" for full support ({error})',
  }),
];
