const DAY_MS = 24 * 60 * 60 * 1000;

/** Undated tags fill the listing only while it is shorter than this. */
export const MAX_UNDATED_FILL = 20;

export const DEFAULT_TAG_WINDOW_DAYS = 90;

export interface ImageTag {
  readonly tag: string;
  readonly imageRef: string;
  readonly date: Date | null;
}

export interface RecentImageTag {
  readonly tag: string;
  readonly imageRef: string;
  /** `YYYY-MM-DD`, or null when the tag carries no build date. */
  readonly date: string | null;
  readonly ageDays: number | null;
}

/** Reads the first `YYYYMMDD` run in a tag such as `40-stable-20240722`. */
export function parseTagDate(tag: string): Date | null {
  const match = /(\d{4})(\d{2})(\d{2})/.exec(tag);
  if (!match) {
    return null;
  }
  const [year, month, day] = [match[1], match[2], match[3]].map(Number);
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date;
}

/**
 * A branch matches tags that start with it. `stable` and `testing` also
 * match release-prefixed tags such as `40-stable-20240722`; `all` matches
 * everything.
 */
export function matchesBranch(tag: string, branch: string): boolean {
  if (branch === "all" || tag.startsWith(branch)) {
    return true;
  }
  return (
    (branch === "stable" || branch === "testing") &&
    new RegExp(`^\\d+-${branch}`).test(tag)
  );
}

/** Filters `tags` to `branch` and orders them newest first, undated last. */
export function toImageTags(
  repository: string,
  tags: readonly string[],
  branch: string,
): ImageTag[] {
  return tags
    .filter((tag) => matchesBranch(tag, branch))
    .map((tag) => ({
      tag,
      imageRef: `${repository}:${tag}`,
      date: parseTagDate(tag),
    }))
    .sort(newestFirst);
}

function newestFirst(a: ImageTag, b: ImageTag): number {
  if (a.date && b.date) {
    return b.date.getTime() - a.date.getTime();
  }
  if (a.date) {
    return -1;
  }
  return b.date ? 1 : 0;
}

export function selectRecentTags(
  tags: readonly ImageTag[],
  days: number,
  now: Date,
): RecentImageTag[] {
  const cutoff = now.getTime() - days * DAY_MS;
  const recent: RecentImageTag[] = [];
  for (const image of tags) {
    if (image.date) {
      if (image.date.getTime() >= cutoff) {
        recent.push(describeTag(image, now));
      }
    } else if (recent.length < MAX_UNDATED_FILL) {
      recent.push(describeTag(image, now));
    }
  }
  return recent;
}

function describeTag(image: ImageTag, now: Date): RecentImageTag {
  return {
    tag: image.tag,
    imageRef: image.imageRef,
    date: image.date ? image.date.toISOString().slice(0, 10) : null,
    ageDays: image.date
      ? Math.floor((now.getTime() - image.date.getTime()) / DAY_MS)
      : null,
  };
}
