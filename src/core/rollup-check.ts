import type { MarkerRepository } from "./git";
import { createLogger, type Logger } from "./log";
import { suggestMarkers, type Suggestion } from "./suggest";
import { DEFAULT_INITIAL_AS_CHANGES, normalizeTag } from "./defaults";

export interface DivergenceReport {
  hasChanges: boolean;
  baseTag: string; // "" when the marker did not exist
  ahead: number;
  currentBranch: string;
}

export interface CheckOptions {
  tag?: string;
  initialAsChanges?: boolean; // what to report when the marker is missing
  logger?: Logger;
}

export interface CheckResult {
  report: DivergenceReport;
  // near-miss tag names, only when the marker is missing
  suggestions: Suggestion[];
}

/**
 * Compares HEAD with the marker tag. A missing marker is not an error: the
 * report then follows `initialAsChanges` and carries an empty base tag.
 */
export async function checkRollup(
  repo: MarkerRepository,
  opts: CheckOptions = {},
): Promise<CheckResult> {
  const log = opts.logger ?? createLogger();
  const tag = normalizeTag(opts.tag);
  const initialAsChanges = opts.initialAsChanges ?? DEFAULT_INITIAL_AS_CHANGES;

  const currentBranch = await repo.currentBranch();
  const target = await repo.resolveMarker(tag);

  if (target === undefined) {
    const policy = initialAsChanges ? "all commits as new" : "no changes";
    log.info(`tag '${tag}' not found; reporting ${policy}`);
    const suggestions = await findSuggestions(repo, tag, log);
    return {
      report: {
        hasChanges: initialAsChanges,
        baseTag: "",
        ahead: 0,
        currentBranch,
      },
      suggestions,
    };
  }

  const ahead = await repo.countAhead(target);
  const commits = `${ahead} commit${ahead === 1 ? "" : "s"}`;
  log.info(
    `${currentBranch} is ${commits} ahead of '${tag}' (${target.slice(0, 12)})`,
  );
  return {
    report: { hasChanges: ahead > 0, baseTag: tag, ahead, currentBranch },
    suggestions: [],
  };
}

// Advisory only: a failure here is logged and never fails the check.
async function findSuggestions(
  repo: MarkerRepository,
  tag: string,
  log: Logger,
): Promise<Suggestion[]> {
  let existing: string[];
  try {
    existing = await repo.listMarkers();
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    log.warn(`could not list tags for suggestions: ${reason}`);
    return [];
  }
  if (!existing.length) {
    log.info(
      "no tags exist locally; if one is expected, make sure the checkout fetched tags",
    );
    return [];
  }
  const suggestions = suggestMarkers(tag, existing);
  for (const s of suggestions) {
    log.warn(
      `requested tag '${tag}' does not exist; did you mean '${s.name}'?`,
    );
  }
  return suggestions;
}
