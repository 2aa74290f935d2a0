import type { GatedAccessor } from "../capabilities/accessor.js";
import { getDefaultAccessor } from "../capabilities/default.js";
import { CapabilityUnavailableError } from "../capabilities/errors.js";

type GitStatus = {
  current: string | null;
  isClean: () => boolean;
};

type GitClient = {
  revparse: (options: string[]) => Promise<string>;
  status: () => Promise<GitStatus>;
};

type GitFactory = (baseDir: string) => GitClient;

function isGitFactory(value: unknown): value is GitFactory {
  return typeof value === "function";
}

export type RepositoryInfo = {
  head: string;
  branch: string | null;
  clean: boolean;
};

/**
 * HEAD commit, current branch and working-tree state of the repository at `cwd`.
 * Rejects with CapabilityUnavailableError when git support is not installed.
 */
export async function describeRepository(
  cwd: string,
  opts: { accessor?: GatedAccessor } = {},
): Promise<RepositoryInfo> {
  const accessor = opts.accessor ?? getDefaultAccessor();
  const handle = await accessor.require("git");
  const simpleGit = handle.exportOf("simple-git", "simpleGit");
  if (!isGitFactory(simpleGit)) {
    throw new CapabilityUnavailableError(
      "git",
      'simple-git does not export "simpleGit"',
      "incompatible",
    );
  }
  const git = simpleGit(cwd);
  const [head, status] = await Promise.all([git.revparse(["HEAD"]), git.status()]);
  return {
    head: head.trim(),
    branch: status.current,
    clean: status.isClean(),
  };
}
