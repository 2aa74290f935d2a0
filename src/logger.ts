import { logVerbose } from "./globals.js";
import { theme } from "./terminal/theme.js";

export type CapabilityLogger = {
  debug?: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

/**
 * Console logger used when the host does not inject one.
 * debug/info only print in verbose mode; warnings and errors always print.
 */
export function createConsoleLogger(prefix = "utilbox"): CapabilityLogger {
  const tag = `[${prefix}]`;
  return {
    debug: (message) => logVerbose(`${tag} ${message}`),
    info: (message) => logVerbose(`${tag} ${message}`),
    warn: (message) => console.warn(theme.warn(`${tag} ${message}`)),
    error: (message) => console.error(theme.error(`${tag} ${message}`)),
  };
}

export const silentLogger: CapabilityLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
