import { createGitRepository, type MarkerRepository } from "../core/git";
import { createLogger, type Logger } from "../core/log";
import { emitOutputs, reportOutputs } from "../core/outputs";
import { checkRollup } from "../core/rollup-check";
import { publishMarker } from "../core/publish";
import { resolveCheckInputs, resolvePublishInputs } from "./inputs";

export const CHECK_HELP = `Usage: deploy-marker-check [options]

Report how far HEAD has moved since the deployment marker tag.

Options:
  --tag <name>                  Marker tag (env INPUT_TAG, default last-deploy)
  --initial-as-changes <bool>   Report changes when the tag is missing
                                (env INPUT_INITIAL_AS_CHANGES, default true)
  --cwd <dir>                   Repository directory (env DEPLOY_MARKER_CWD)
  -h, --help                    Show this help

Outputs: has_changes, base_tag, ahead, current_branch
`;

export const PUBLISH_HELP = `Usage: deploy-marker-publish [options]

Force-move the deployment marker tag to HEAD and force-push it.

Options:
  --tag <name>                  Marker tag (env INPUT_TAG, default last-deploy)
  --remote <name>               Remote to push to
                                (env INPUT_REMOTE, default origin)
  --expected-base-tag <name>    base_tag reported by the check stage; must
                                equal --tag when non-empty
                                (env INPUT_EXPECTED_BASE_TAG)
  --cwd <dir>                   Repository directory (env DEPLOY_MARKER_CWD)
  -h, --help                    Show this help
`;

export interface RunContext {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  write?: (text: string) => void;
  openRepository?: (cwd: string) => MarkerRepository;
}

function explain(err: unknown): string {
  return err instanceof Error ? `${err.name}: ${err.message}` : String(err);
}

// Unset only when the inputs themselves could not be resolved.
function stage(name: string, tag: string | undefined): string {
  return tag === undefined ? name : `${name} of tag '${tag}'`;
}

/** Runs the check stage; resolves to the process exit code. */
export async function runCheck(
  argv: string[],
  ctx: RunContext = {},
): Promise<number> {
  const env = ctx.env ?? process.env;
  const log = ctx.logger ?? createLogger();
  const write = ctx.write ?? ((text: string) => process.stdout.write(text));
  let tag: string | undefined;
  try {
    const inputs = resolveCheckInputs(argv, env);
    tag = inputs.tag;
    if (inputs.help) {
      write(CHECK_HELP);
      return 0;
    }
    const repo = (ctx.openRepository ?? createGitRepository)(inputs.cwd);
    const { report } = await checkRollup(repo, {
      tag: inputs.tag,
      initialAsChanges: inputs.initialAsChanges,
      logger: log,
    });
    emitOutputs(reportOutputs(report), env, write);
    return 0;
  } catch (err) {
    log.error(`${stage("check", tag)} failed: ${explain(err)}`);
    return 1;
  }
}

/** Runs the publish stage; resolves to the process exit code. */
export async function runPublish(
  argv: string[],
  ctx: RunContext = {},
): Promise<number> {
  const env = ctx.env ?? process.env;
  const log = ctx.logger ?? createLogger();
  const write = ctx.write ?? ((text: string) => process.stdout.write(text));
  let tag: string | undefined;
  try {
    const inputs = resolvePublishInputs(argv, env);
    tag = inputs.tag;
    if (inputs.help) {
      write(PUBLISH_HELP);
      return 0;
    }
    const repo = (ctx.openRepository ?? createGitRepository)(inputs.cwd);
    await publishMarker(repo, {
      tag: inputs.tag,
      remote: inputs.remote,
      expectedBaseTag: inputs.expectedBaseTag,
      logger: log,
    });
    return 0;
  } catch (err) {
    log.error(`${stage("publish", tag)} failed: ${explain(err)}`);
    return 1;
  }
}
