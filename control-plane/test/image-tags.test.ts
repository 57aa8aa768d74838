import { describe, expect, test, vi, type Mock } from "vitest";
import type { CommandRunner } from "../src/adapters/command-runner.js";
import { SkopeoTagSource } from "../src/adapters/skopeo-tag-source.js";
import {
  matchesBranch,
  parseTagDate,
  selectRecentTags,
  toImageTags,
} from "../src/domain/image-tag.js";
import { createLogger } from "../src/observability/logger.js";
import type { ImageTagSource, TagListing } from "../src/ports/image-tag-source.js";
import { ImageTagFinder } from "../src/services/image-tags.js";

const logger = createLogger({}, { level: "error" });
const REPOSITORY = "ghcr.io/ublue-os/bazzite";
const NOW = new Date("2024-08-01T00:00:00.000Z");
const PUBLISHED_TAGS = [
  "stable",
  "testing",
  "40-stable-20240722",
  "40-stable-20240420",
  "40-stable-20240101",
  "40-testing-20240730",
  "latest",
  "stable-daily",
  "41-stable-20241399",
];

function fakeSource(listing: TagListing): ImageTagSource & {
  listTags: Mock<(repository: string) => Promise<TagListing>>;
} {
  return {
    listTags: vi.fn<(repository: string) => Promise<TagListing>>(async () => listing),
  };
}

describe("image tags", () => {
  test("should read build dates from tags", () => {
    expect(parseTagDate("40-stable-20240722")).toEqual(
      new Date("2024-07-22T00:00:00.000Z"),
    );
    expect(parseTagDate("stable-20240101")).toEqual(
      new Date("2024-01-01T00:00:00.000Z"),
    );
    expect(parseTagDate("41-stable-20241399")).toBeNull();
    expect(parseTagDate("20240230")).toBeNull();
    expect(parseTagDate("stable")).toBeNull();
  });

  test("should match branches by prefix and by release-prefixed tags", () => {
    expect(matchesBranch("stable-daily", "stable")).toBe(true);
    expect(matchesBranch("40-stable-20240722", "stable")).toBe(true);
    expect(matchesBranch("40-testing-20240730", "stable")).toBe(false);
    expect(matchesBranch("40-testing-20240730", "testing")).toBe(true);
    expect(matchesBranch("40-latest", "latest")).toBe(false);
    expect(matchesBranch("anything", "all")).toBe(true);
  });

  test("should order dated tags newest first and undated tags last", () => {
    expect(
      toImageTags(REPOSITORY, PUBLISHED_TAGS, "stable").map((image) => image.tag),
    ).toEqual([
      "40-stable-20240722",
      "40-stable-20240420",
      "40-stable-20240101",
      "stable",
      "stable-daily",
      "41-stable-20241399",
    ]);
  });

  test("should keep tags inside the age window", () => {
    const tags = toImageTags(REPOSITORY, PUBLISHED_TAGS, "stable");

    expect(selectRecentTags(tags, 90, NOW)).toEqual([
      {
        tag: "40-stable-20240722",
        imageRef: "ghcr.io/ublue-os/bazzite:40-stable-20240722",
        date: "2024-07-22",
        ageDays: 10,
      },
      {
        tag: "stable",
        imageRef: "ghcr.io/ublue-os/bazzite:stable",
        date: null,
        ageDays: null,
      },
      {
        tag: "stable-daily",
        imageRef: "ghcr.io/ublue-os/bazzite:stable-daily",
        date: null,
        ageDays: null,
      },
      {
        tag: "41-stable-20241399",
        imageRef: "ghcr.io/ublue-os/bazzite:41-stable-20241399",
        date: null,
        ageDays: null,
      },
    ]);
    expect(
      selectRecentTags(tags, 120, NOW).map((image) => [image.tag, image.ageDays]),
    ).toEqual([
      ["40-stable-20240722", 10],
      ["40-stable-20240420", 103],
      ["stable", null],
      ["stable-daily", null],
      ["41-stable-20241399", null],
    ]);
  });

  test("should stop adding undated tags once twenty are listed", () => {
    const undated = Array.from({ length: 25 }, (_, index) => `build-${index}`);
    const tags = toImageTags(REPOSITORY, undated, "all");

    const recent = selectRecentTags(tags, 90, NOW);

    expect(recent).toHaveLength(20);
    expect(recent[19].tag).toBe("build-19");
  });
});

describe("SkopeoTagSource", () => {
  test("should list tags through the launcher", async () => {
    const runner = vi.fn<CommandRunner>(async () =>
      JSON.stringify({ Repository: REPOSITORY, Tags: ["stable", "testing"] }),
    );
    const source = new SkopeoTagSource({
      launcher: ["flatpak-spawn", "--host"],
      runner,
      logger,
    });

    expect(await source.listTags(REPOSITORY)).toEqual({
      available: true,
      tags: ["stable", "testing"],
    });
    expect(runner).toHaveBeenCalledWith(
      "flatpak-spawn",
      ["--host", "skopeo", "list-tags", "docker://ghcr.io/ublue-os/bazzite"],
      { timeoutMs: 30_000 },
    );
  });

  test("should cache a listing for five minutes", async () => {
    let now = 0;
    const runner = vi.fn<CommandRunner>(async () => JSON.stringify({ Tags: ["stable"] }));
    const source = new SkopeoTagSource({ runner, now: () => now, logger });

    await source.listTags(REPOSITORY);
    now = 60_000;
    await source.listTags(REPOSITORY);
    expect(runner).toHaveBeenCalledTimes(1);

    now = 300_000;
    await source.listTags(REPOSITORY);
    expect(runner).toHaveBeenCalledTimes(2);
  });

  test("should report failures as unavailable without caching them", async () => {
    const runner = vi
      .fn<CommandRunner>()
      .mockRejectedValueOnce(new Error("spawn skopeo ENOENT"))
      .mockResolvedValueOnce("not json")
      .mockResolvedValueOnce(JSON.stringify({ Tags: "stable" }))
      .mockResolvedValueOnce(JSON.stringify({ Tags: ["stable"] }));
    const source = new SkopeoTagSource({ runner, logger });

    expect(await source.listTags(REPOSITORY)).toEqual({
      available: false,
      reason: "skopeo list-tags failed: spawn skopeo ENOENT",
    });
    expect(await source.listTags(REPOSITORY)).toMatchObject({
      available: false,
      reason: expect.stringMatching(/^skopeo list-tags returned invalid JSON: /),
    });
    expect(await source.listTags(REPOSITORY)).toEqual({
      available: false,
      reason: "skopeo list-tags output has no Tags array",
    });
    expect(await source.listTags(REPOSITORY)).toEqual({
      available: true,
      tags: ["stable"],
    });
  });
});

describe("ImageTagFinder", () => {
  test("should list recent tags of an allow-listed repository", async () => {
    const source = fakeSource({ available: true, tags: PUBLISHED_TAGS });
    const finder = new ImageTagFinder({ source, clock: () => NOW });

    const result = await finder.findRecent({
      image: "ostree-image-signed:docker://ghcr.io/ublue-os/bazzite",
      branch: "testing",
      days: 30,
    });

    expect(source.listTags).toHaveBeenCalledWith(REPOSITORY);
    expect(result).toEqual({
      ok: true,
      repository: REPOSITORY,
      branch: "testing",
      days: 30,
      tags: [
        {
          tag: "40-testing-20240730",
          imageRef: "ghcr.io/ublue-os/bazzite:40-testing-20240730",
          date: "2024-07-30",
          ageDays: 2,
        },
        {
          tag: "testing",
          imageRef: "ghcr.io/ublue-os/bazzite:testing",
          date: null,
          ageDays: null,
        },
      ],
    });
  });

  test("should reject references that are not a bare allow-listed repository", async () => {
    const source = fakeSource({ available: true, tags: [] });
    const finder = new ImageTagFinder({ source, clock: () => NOW });

    expect(await finder.findRecent({ image: `${REPOSITORY}:stable` })).toEqual({
      ok: false,
      code: "rejected",
      reason: "Image must name a registry repository without a tag or digest",
    });
    expect(await finder.findRecent({ image: "docker.io/library/fedora" })).toEqual({
      ok: false,
      code: "rejected",
      reason:
        "Registry docker.io is not an allowed registry. Allowed registries: ghcr.io, quay.io, registry.fedoraproject.org",
    });
    expect(
      await finder.findRecent({ image: "ghcr.io/ublue-os/custom-image" }),
    ).toMatchObject({ ok: false, code: "rejected", reason: expect.stringContaining("not allowed") });
    expect(
      await finder.findRecent({ image: "ghcr.io/ublue-os/../bazzite" }),
    ).toMatchObject({
      ok: false,
      code: "rejected",
      reason: expect.stringContaining("suspicious pattern"),
    });
    expect(source.listTags).not.toHaveBeenCalled();
  });

  test("should pass an unavailable listing through", async () => {
    const finder = new ImageTagFinder({
      source: fakeSource({ available: false, reason: "skopeo list-tags failed: timeout" }),
    });

    expect(await finder.findRecent({ image: REPOSITORY })).toEqual({
      ok: false,
      code: "unavailable",
      reason: "skopeo list-tags failed: timeout",
    });
  });
});
