import type { Command } from "commander";
import type { CapabilityRegistry } from "../capabilities/registry.js";
import { renderCapabilityReport } from "../capabilities/report.js";
import { setVerbose } from "../globals.js";
import type { RuntimeEnv } from "../runtime.js";
import { runCommandWithRuntime } from "./cli-utils.js";

export type CapabilitiesCommandDeps = {
  registry: () => CapabilityRegistry;
  runtime: RuntimeEnv;
  /** Whether the output stream understands ANSI colours. */
  colorSupported: boolean;
};

export function registerCapabilitiesCommands(program: Command, deps: CapabilitiesCommandDeps) {
  const { runtime } = deps;
  const capabilities = program
    .command("capabilities")
    .description("Inspect which optional capabilities are usable in this environment")
    .showHelpAfterError();

  capabilities
    .command("list", { isDefault: true })
    .description("Probe every registered capability and print its status")
    .option("--json", "Print machine-readable JSON", false)
    .option("--available", "Only show available capabilities", false)
    .option("--no-color", "Disable coloured output")
    .option("--verbose", "Verbose logging", false)
    .action(async (opts: { json: boolean; available: boolean; color: boolean; verbose: boolean }) => {
      setVerbose(Boolean(opts.verbose));
      await runCommandWithRuntime(runtime, async () => {
        const entries = await deps.registry().list();
        const shown = opts.available
          ? entries.filter((entry) => entry.status === "available")
          : entries;
        if (opts.json) {
          runtime.log(JSON.stringify(shown, null, 2));
          return;
        }
        runtime.log(renderCapabilityReport(shown, { rich: opts.color && deps.colorSupported }));
      });
    });

  capabilities
    .command("check")
    .description("Exit non-zero unless every named capability is available")
    .argument("<names...>", "Capability names")
    .action(async (names: string[]) => {
      await runCommandWithRuntime(runtime, async () => {
        const registry = deps.registry();
        const unknown = names.filter((name) => !registry.has(name));
        if (unknown.length > 0) {
          runtime.error(`Unknown capability: ${unknown.join(", ")}`);
          runtime.exit(2);
          return;
        }
        let missing = 0;
        for (const name of names) {
          const result = await registry.resolve(name);
          if (result.status === "available") {
            runtime.log(`${name}: available`);
          } else {
            missing += 1;
            runtime.log(`${name}: ${result.reason}`);
          }
        }
        if (missing > 0) {
          runtime.exit(1);
        }
      });
    });
}
