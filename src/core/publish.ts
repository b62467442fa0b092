import type { MarkerRepository } from "./git";
import { createLogger, type Logger } from "./log";
import { assertExpectedBase } from "./guards";
import { DEFAULT_REMOTE, normalizeTag } from "./defaults";
import { MarkerMoveError, MarkerPushError } from "../types/errors";

export interface PublishOptions {
  tag?: string;
  remote?: string;
  expectedBaseTag?: string; // base_tag from the check stage; "" skips the check
  logger?: Logger;
}

export interface PublishResult {
  tag: string;
  remote: string;
  target: string;
  previousTarget: string | undefined;
}

/**
 * Moves the marker to HEAD and force-pushes it. The last push wins: the
 * safety token only catches a check/publish naming mismatch, not a marker
 * moved by someone else in between.
 */
export async function publishMarker(
  repo: MarkerRepository,
  opts: PublishOptions = {},
): Promise<PublishResult> {
  const log = opts.logger ?? createLogger();
  const tag = normalizeTag(opts.tag);
  const remote = opts.remote?.trim() || DEFAULT_REMOTE;

  assertExpectedBase(opts.expectedBaseTag?.trim(), tag);

  // HEAD is read once; the tag is pointed at that exact commit.
  const target = await repo.headCommit();
  const previousTarget = await repo.resolveMarker(tag);
  try {
    await repo.moveMarker(tag, target);
  } catch (err) {
    throw new MarkerMoveError(tag, asError(err));
  }
  log.info(
    previousTarget === undefined
      ? `created tag '${tag}' at ${target}`
      : previousTarget === target
        ? `tag '${tag}' already at ${target}`
        : `moved tag '${tag}' from ${previousTarget} to ${target}`,
  );

  try {
    await repo.pushMarker(tag, remote);
  } catch (err) {
    throw new MarkerPushError(tag, remote, asError(err));
  }
  log.info(`pushed tag '${tag}' to '${remote}'`);

  return { tag, remote, target, previousTarget };
}

function asError(err: unknown): Error {
  if (err instanceof Error) return err;
  return new Error(String(err));
}
