import {
  DEFAULT_REGISTRY_ALLOWLIST,
  parseImageReference,
  validateImageReference,
  type RegistryAllowlist,
} from "@atomic-image-manager/executor";
import {
  DEFAULT_TAG_WINDOW_DAYS,
  selectRecentTags,
  toImageTags,
  type RecentImageTag,
} from "../domain/image-tag.js";
import type { ImageTagSource } from "../ports/image-tag-source.js";

export interface RecentTagsQuery {
  /** Registry repository such as `ghcr.io/ublue-os/bazzite`, no tag. */
  readonly image: string;
  readonly branch?: string;
  readonly days?: number;
}

export type RecentTagsResult =
  | {
      readonly ok: true;
      readonly repository: string;
      readonly branch: string;
      readonly days: number;
      readonly tags: readonly RecentImageTag[];
    }
  | { readonly ok: false; readonly code: "rejected"; readonly reason: string }
  | { readonly ok: false; readonly code: "unavailable"; readonly reason: string };

export interface ImageTagFinderOptions {
  readonly source: ImageTagSource;
  readonly allowlist?: RegistryAllowlist;
  readonly clock?: () => Date;
}

/** Recent tags of allow-listed repositories, for picking a rebase target. */
export class ImageTagFinder {
  private readonly allowlist: RegistryAllowlist;
  private readonly clock: () => Date;

  constructor(private readonly options: ImageTagFinderOptions) {
    this.allowlist = options.allowlist ?? DEFAULT_REGISTRY_ALLOWLIST;
    this.clock = options.clock ?? (() => new Date());
  }

  async findRecent(query: RecentTagsQuery): Promise<RecentTagsResult> {
    const branch = query.branch ?? "stable";
    const days = query.days ?? DEFAULT_TAG_WINDOW_DAYS;

    const parsed = parseImageReference(query.image);
    if (!parsed || parsed.tag !== null || parsed.digest !== null) {
      return {
        ok: false,
        code: "rejected",
        reason: "Image must name a registry repository without a tag or digest",
      };
    }
    const repository = `${parsed.host}/${parsed.repository}`;
    const validation = validateImageReference(`${repository}:latest`, {
      allowlist: this.allowlist,
    });
    if (!validation.ok) {
      return { ok: false, code: "rejected", reason: validation.error.message };
    }

    const listing = await this.options.source.listTags(repository);
    if (!listing.available) {
      return { ok: false, code: "unavailable", reason: listing.reason };
    }

    return {
      ok: true,
      repository,
      branch,
      days,
      tags: selectRecentTags(
        toImageTags(repository, listing.tags, branch),
        days,
        this.clock(),
      ),
    };
  }
}
