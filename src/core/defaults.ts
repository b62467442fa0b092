export const DEFAULT_TAG = "last-deploy";
export const DEFAULT_REMOTE = "origin";
export const DEFAULT_INITIAL_AS_CHANGES = true;

/** Blank or missing names fall back to the default marker. */
export function normalizeTag(tag: string | undefined): string {
  const trimmed = tag?.trim();
  return trimmed || DEFAULT_TAG;
}
