export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class GitCommandError extends Error {
  readonly args: readonly string[];
  readonly exitCode: number;
  readonly stderr: string;

  constructor(args: readonly string[], exitCode: number, stderr: string) {
    const detail = stderr.trim() || `exit code ${exitCode}`;
    super(`git ${args.join(" ")} failed: ${detail}`);
    this.name = "GitCommandError";
    this.args = args;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export class MarkerMismatchError extends Error {
  readonly expected: string;
  readonly requested: string;

  constructor(expected: string, requested: string, hint?: string) {
    const reported = `the check stage reported base tag '${expected}'`;
    super(
      `Refusing to move tag '${requested}': ${reported}` +
        (hint ? ` (${hint})` : ""),
    );
    this.name = "MarkerMismatchError";
    this.expected = expected;
    this.requested = requested;
  }
}

export class MarkerMoveError extends Error {
  readonly tag: string;

  constructor(tag: string, cause: Error) {
    super(`Could not move tag '${tag}' to HEAD: ${cause.message}`, { cause });
    this.name = "MarkerMoveError";
    this.tag = tag;
  }
}

export class MarkerPushError extends Error {
  readonly tag: string;
  readonly remote: string;

  constructor(tag: string, remote: string, cause: Error) {
    super(`Could not push tag '${tag}' to '${remote}': ${cause.message}`, {
      cause,
    });
    this.name = "MarkerPushError";
    this.tag = tag;
    this.remote = remote;
  }
}
