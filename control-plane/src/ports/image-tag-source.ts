export type TagListing =
  | { readonly available: true; readonly tags: readonly string[] }
  | { readonly available: false; readonly reason: string };

/** Lists the tags a registry publishes for one repository. */
export interface ImageTagSource {
  /** `repository` is `host/path` without transport, tag or digest. */
  listTags(repository: string): Promise<TagListing>;
}
