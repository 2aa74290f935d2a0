import { Command } from "commander";
import { getDefaultRegistry } from "../capabilities/default.js";
import type { CapabilityRegistry } from "../capabilities/registry.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { registerCapabilitiesCommands } from "./register.capabilities.js";

export function buildProgram(
  deps: {
    registry?: () => CapabilityRegistry;
    runtime?: RuntimeEnv;
    colorSupported?: boolean;
  } = {},
): Command {
  const program = new Command("utilbox")
    .description("Utility toolbox with optional, capability-gated integrations")
    .showHelpAfterError();

  registerCapabilitiesCommands(program, {
    registry: deps.registry ?? getDefaultRegistry,
    runtime: deps.runtime ?? defaultRuntime,
    colorSupported: deps.colorSupported ?? Boolean(process.stdout.isTTY),
  });
  return program;
}
