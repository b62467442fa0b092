import { spawnSync } from "node:child_process";
import { GitCommandError } from "../types/errors";

/**
 * Operations the checker and publisher need from a repository.
 * Markers are tags; names are given without the `refs/tags/` prefix.
 */
export interface MarkerRepository {
  /** Short name of the checked-out branch, or `HEAD` when detached. */
  currentBranch(): Promise<string>;
  /** Commit the marker points at, or undefined when no such tag exists. */
  resolveMarker(name: string): Promise<string | undefined>;
  /** Number of commits reachable from HEAD but not from `commit`. */
  countAhead(commit: string): Promise<number>;
  listMarkers(): Promise<string[]>;
  headCommit(): Promise<string>;
  /** Creates or force-moves the tag to `commit`. */
  moveMarker(name: string, commit: string): Promise<void>;
  /** Force-pushes the tag, replacing whatever the remote holds. */
  pushMarker(name: string, remote: string): Promise<void>;
}

export interface GitResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export function git(cwd: string, args: readonly string[]): GitResult {
  const r = spawnSync("git", args, {
    cwd,
    encoding: "utf8",
    stdio: ["ignore", "pipe", "pipe"],
  });
  if (r.error) {
    throw new GitCommandError(args, -1, r.error.message);
  }
  return { exitCode: r.status ?? -1, stdout: r.stdout, stderr: r.stderr };
}

function gitOrFail(cwd: string, args: readonly string[]): string {
  const r = git(cwd, args);
  if (r.exitCode !== 0) {
    throw new GitCommandError(args, r.exitCode, r.stderr);
  }
  return r.stdout;
}

function tagRef(name: string): string {
  return `refs/tags/${name}`;
}

export function createGitRepository(
  cwd: string = process.cwd(),
): MarkerRepository {
  return {
    async currentBranch() {
      return gitOrFail(cwd, ["rev-parse", "--abbrev-ref", "HEAD"]).trim();
    },

    async resolveMarker(name) {
      const args = ["rev-parse", "-q", "--verify", `${tagRef(name)}^{commit}`];
      const r = git(cwd, args);
      // --verify -q exits 1 with no output when the ref is missing
      if (r.exitCode === 1 && !r.stderr.trim()) return undefined;
      if (r.exitCode !== 0) {
        throw new GitCommandError(args, r.exitCode, r.stderr);
      }
      return r.stdout.trim();
    },

    async countAhead(commit) {
      const out = gitOrFail(cwd, ["rev-list", "--count", `${commit}..HEAD`]);
      const n = Number.parseInt(out.trim(), 10);
      if (!Number.isInteger(n) || n < 0) {
        throw new GitCommandError(
          ["rev-list", "--count", `${commit}..HEAD`],
          0,
          `unexpected output '${out.trim()}'`,
        );
      }
      return n;
    },

    async listMarkers() {
      return gitOrFail(cwd, ["tag", "--list"])
        .split("\n")
        .map((line) => line.trim())
        .filter(Boolean);
    },

    async headCommit() {
      return gitOrFail(cwd, ["rev-parse", "HEAD"]).trim();
    },

    async moveMarker(name, commit) {
      gitOrFail(cwd, ["tag", "--force", name, commit]);
    },

    async pushMarker(name, remote) {
      const ref = tagRef(name);
      gitOrFail(cwd, ["push", "--force", remote, `${ref}:${ref}`]);
    },
  };
}
