import { MarkerMismatchError } from "../types/errors";
import { editDistance, typoThreshold } from "./suggest";

/**
 * Safety-token check: a non-empty base tag reported by the check stage must
 * name the same marker the publish stage is about to move.
 */
export function assertExpectedBase(
  expectedBaseTag: string | undefined,
  tag: string,
) {
  if (!expectedBaseTag || expectedBaseTag === tag) return;
  const max = typoThreshold(tag);
  const distance = editDistance(expectedBaseTag, tag, max);
  const chars = `${distance} character${distance === 1 ? "" : "s"}`;
  const hint =
    distance <= max
      ? `the names differ by ${chars}; check for a typo`
      : undefined;
  throw new MarkerMismatchError(expectedBaseTag, tag, hint);
}
