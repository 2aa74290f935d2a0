import { isCapabilityError } from "../capabilities/errors.js";
import type { RuntimeEnv } from "../runtime.js";

export async function runCommandWithRuntime(
  runtime: RuntimeEnv,
  action: () => Promise<void>,
): Promise<void> {
  try {
    await action();
  } catch (err) {
    const message = isCapabilityError(err) ? `${err.code}: ${err.message}` : String(err);
    runtime.error(message);
    runtime.exit(1);
  }
}
