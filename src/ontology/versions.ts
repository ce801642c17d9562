// Version tags.
// Purpose: parse and order `v<N>` tags; N is the rank used for every ordering in the tool.
// Assumes ranks stay within MAX_VERSION_RANK: every version up to `current` is materialized.

export type VersionTag = `v${number}`;

/** Highest accepted rank. Totalization and emission are linear in `current`. */
export const MAX_VERSION_RANK = 1024;

const VERSION_PATTERN = /^v([1-9][0-9]*)$/;

export function isVersionTag(value: string): value is VersionTag {
  const match = VERSION_PATTERN.exec(value);
  return match !== null && Number(match[1]) <= MAX_VERSION_RANK;
}

export function versionRank(tag: VersionTag): number {
  if (!isVersionTag(tag)) {
    throw new RangeError(`Not a version tag up to v${MAX_VERSION_RANK}: ${tag}`);
  }
  return Number(tag.slice(1));
}

export function versionTag(rank: number): VersionTag {
  return `v${rank}`;
}

export function compareVersions(a: VersionTag, b: VersionTag): number {
  return versionRank(a) - versionRank(b);
}

/** Every tag from v1 through `current`, in order. */
export function versionRange(current: VersionTag): VersionTag[] {
  const tags: VersionTag[] = [];
  const last = versionRank(current);
  for (let rank = 1; rank <= last; rank += 1) {
    tags.push(versionTag(rank));
  }
  return tags;
}
