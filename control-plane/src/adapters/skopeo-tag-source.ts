import { z } from "zod";
import { createLogger, type Logger } from "../observability/logger.js";
import type { ImageTagSource, TagListing } from "../ports/image-tag-source.js";
import { execFileRunner, type CommandRunner } from "./command-runner.js";

const listTagsOutputSchema = z.object({
  Tags: z.array(z.string()),
});

export interface SkopeoTagSourceOptions {
  readonly launcher?: readonly string[];
  readonly timeoutMs?: number;
  readonly cacheTtlMs?: number;
  readonly runner?: CommandRunner;
  readonly now?: () => number;
  readonly logger?: Logger;
}

interface CachedTags {
  readonly fetchedAt: number;
  readonly tags: readonly string[];
}

export class SkopeoTagSource implements ImageTagSource {
  private readonly launcher: readonly string[];
  private readonly timeoutMs: number;
  private readonly cacheTtlMs: number;
  private readonly runner: CommandRunner;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly cache = new Map<string, CachedTags>();

  constructor(options: SkopeoTagSourceOptions = {}) {
    this.launcher = options.launcher ?? [];
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.cacheTtlMs = options.cacheTtlMs ?? 5 * 60_000;
    this.runner = options.runner ?? execFileRunner;
    this.now = options.now ?? Date.now;
    this.logger = (options.logger ?? createLogger()).child({
      component: "tag-source",
    });
  }

  async listTags(repository: string): Promise<TagListing> {
    const cached = this.cache.get(repository);
    if (cached && this.now() - cached.fetchedAt < this.cacheTtlMs) {
      return { available: true, tags: cached.tags };
    }

    const argv = [
      ...this.launcher,
      "skopeo",
      "list-tags",
      `docker://${repository}`,
    ];
    let stdout: string;
    try {
      stdout = await this.runner(argv[0], argv.slice(1), {
        timeoutMs: this.timeoutMs,
      });
    } catch (error) {
      return this.unavailable(repository, `skopeo list-tags failed: ${describeError(error)}`);
    }

    let document: unknown;
    try {
      document = JSON.parse(stdout);
    } catch (error) {
      return this.unavailable(
        repository,
        `skopeo list-tags returned invalid JSON: ${describeError(error)}`,
      );
    }

    const parsed = listTagsOutputSchema.safeParse(document);
    if (!parsed.success) {
      return this.unavailable(repository, "skopeo list-tags output has no Tags array");
    }

    this.cache.set(repository, { fetchedAt: this.now(), tags: parsed.data.Tags });
    return { available: true, tags: parsed.data.Tags };
  }

  private unavailable(repository: string, reason: string): TagListing {
    this.logger.warn("tags unavailable", { repository, reason });
    return { available: false, reason };
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
