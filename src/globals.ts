import { theme } from "./terminal/theme.js";

let globalVerbose = false;

export function setVerbose(value: boolean) {
  globalVerbose = value;
}

export function isVerbose() {
  return globalVerbose;
}

export function logVerbose(message: string) {
  if (!globalVerbose) {
    return;
  }
  console.log(theme.muted(message));
}
