import os from "node:os";
import path from "node:path";

import { execa, type Options } from "execa";
import fse from "fs-extra";

import { GitError, PatchError } from "../core/errors.js";

export type GitResult = { stdout: string; stderr: string; exitCode: number };

export type DiffOptions = {
  // Paths kept out of the diff, e.g. an artifacts directory inside the repo.
  exclude?: string[];
};

export async function git(cwd: string, args: string[], opts: Options = {}): Promise<GitResult> {
  const res = await execa("git", args, {
    cwd,
    stdio: "pipe",
    env: process.env,
    ...opts,
    reject: false,
  });
  const stdout = typeof res.stdout === "string" ? res.stdout : String(res.stdout ?? "");
  const stderr = typeof res.stderr === "string" ? res.stderr : String(res.stderr ?? "");
  const exitCode = typeof res.exitCode === "number" ? res.exitCode : -1;

  if (exitCode !== 0) {
    const detail = stderr.trim() || `exit ${exitCode}`;
    throw new GitError(`git ${args.join(" ")} failed (cwd=${cwd}): ${detail}`, { stdout, stderr });
  }
  return { stdout, stderr, exitCode };
}

// Unified diff against HEAD of everything under cwd, untracked files included.
// Staging happens in a throwaway index so the repository's own index is untouched.
export async function diffWorkingTree(cwd: string, options: DiffOptions = {}): Promise<string> {
  if (!(await isInsideWorkTree(cwd))) {
    return "";
  }

  const pathspec = [".", ...excludePathspecs(cwd, options.exclude ?? [])];
  const tempDir = await fse.mkdtemp(path.join(os.tmpdir(), "patchproof-index-"));
  const indexFile = path.join(tempDir, "index");
  try {
    const { stdout: gitIndexPath } = await git(cwd, ["rev-parse", "--git-path", "index"]);
    const repoIndex = path.resolve(cwd, gitIndexPath.trim());
    if (await fse.pathExists(repoIndex)) {
      await fse.copy(repoIndex, indexFile);
    }

    const env = { GIT_INDEX_FILE: indexFile };
    await git(cwd, ["add", "-A", "--", ...pathspec], { env });
    const res = await git(cwd, ["diff", "--cached", "--", ...pathspec], { env, stripFinalNewline: false });
    return res.stdout;
  } finally {
    await fse.remove(tempDir);
  }
}

export async function applyPatch(cwd: string, patchFile: string): Promise<void> {
  try {
    await git(cwd, ["apply", "--whitespace=nowarn", patchFile]);
  } catch (err) {
    if (err instanceof GitError) {
      throw new PatchError(`Failed to apply ${patchFile}: ${err.message}`, err);
    }
    throw err;
  }
}

async function isInsideWorkTree(cwd: string): Promise<boolean> {
  try {
    const res = await git(cwd, ["rev-parse", "--is-inside-work-tree"]);
    return res.stdout.trim() === "true";
  } catch (err) {
    if (err instanceof GitError) return false;
    throw err;
  }
}

function excludePathspecs(cwd: string, excluded: string[]): string[] {
  return excluded
    .map((entry) => path.relative(cwd, path.resolve(cwd, entry)))
    .filter((rel) => rel !== "" && !rel.startsWith("..") && !path.isAbsolute(rel))
    .map((rel) => `:(exclude)${rel.split(path.sep).join("/")}`);
}
