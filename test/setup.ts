// Repo-wide Vitest setup: every test starts quiet, with no verbose logging
// leaking in from a previous file.
import { afterEach, beforeEach } from "vitest";
import { setVerbose } from "../src/globals.js";

beforeEach(() => {
  setVerbose(false);
});

afterEach(() => {
  setVerbose(false);
});
