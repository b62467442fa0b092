import { parseArgs } from "node:util";
import { ConfigError } from "../types/errors";
import {
  DEFAULT_INITIAL_AS_CHANGES,
  DEFAULT_REMOTE,
  normalizeTag,
} from "../core/defaults";

export interface CheckInputs {
  tag: string;
  initialAsChanges: boolean;
  cwd: string;
  help: boolean;
}

export interface PublishInputs {
  tag: string;
  remote: string;
  expectedBaseTag: string;
  cwd: string;
  help: boolean;
}

type Env = NodeJS.ProcessEnv;

export function parseBoolean(name: string, raw: string): boolean {
  switch (raw.trim().toLowerCase()) {
    case "true":
    case "yes":
    case "1":
      return true;
    case "false":
    case "no":
    case "0":
      return false;
    default:
      throw new ConfigError(
        `Invalid value for ${name}: '${raw}' (expected true or false)`,
      );
  }
}

function guarded<T>(parse: () => T): T {
  try {
    return parse();
  } catch (err) {
    throw new ConfigError(err instanceof Error ? err.message : String(err));
  }
}

// Flag wins over env; a blank env value counts as unset.
function pick(flag: string | boolean | undefined, env: string | undefined) {
  if (typeof flag === "string") return flag;
  return env?.trim() ? env : undefined;
}

export function resolveCheckInputs(argv: string[], env: Env): CheckInputs {
  const { values } = guarded(() =>
    parseArgs({
      args: argv,
      options: {
        tag: { type: "string" },
        "initial-as-changes": { type: "string" },
        cwd: { type: "string" },
        help: { type: "boolean", short: "h" },
      },
      strict: true,
      allowPositionals: false,
    }),
  );
  const rawInitial = pick(
    values["initial-as-changes"],
    env["INPUT_INITIAL_AS_CHANGES"],
  );
  return {
    tag: normalizeTag(pick(values.tag, env["INPUT_TAG"])),
    initialAsChanges:
      rawInitial === undefined
        ? DEFAULT_INITIAL_AS_CHANGES
        : parseBoolean("initial_as_changes", rawInitial),
    cwd: pick(values.cwd, env["DEPLOY_MARKER_CWD"]) ?? process.cwd(),
    help: values.help === true,
  };
}

export function resolvePublishInputs(argv: string[], env: Env): PublishInputs {
  const { values } = guarded(() =>
    parseArgs({
      args: argv,
      options: {
        tag: { type: "string" },
        remote: { type: "string" },
        "expected-base-tag": { type: "string" },
        cwd: { type: "string" },
        help: { type: "boolean", short: "h" },
      },
      strict: true,
      allowPositionals: false,
    }),
  );
  return {
    tag: normalizeTag(pick(values.tag, env["INPUT_TAG"])),
    remote:
      pick(values.remote, env["INPUT_REMOTE"])?.trim() || DEFAULT_REMOTE,
    expectedBaseTag:
      pick(
        values["expected-base-tag"],
        env["INPUT_EXPECTED_BASE_TAG"],
      )?.trim() ?? "",
    cwd: pick(values.cwd, env["DEPLOY_MARKER_CWD"]) ?? process.cwd(),
    help: values.help === true,
  };
}
