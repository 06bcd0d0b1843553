/**
 * Unit tests for the shared pagination loop
 */

import { describe, it, expect, vi } from "vitest";
import type { Logger, PageResult } from "@/types";
import { SourceError } from "@/errors";
import { paginate, type PaginateOptions } from "@/sources/shared";

type Item = { id: string; postedAt?: Date };

const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

const NEW = new Date("2024-06-14T00:00:00.000Z");
const OLD = new Date("2024-05-01T00:00:00.000Z");
const CUTOFF = new Date("2024-06-01T00:00:00.000Z");

function items(prefix: string, count: number, postedAt?: Date): Item[] {
  return Array.from({ length: count }, (_, i) => ({ id: `${prefix}${i}`, postedAt }));
}

function pages(...results: PageResult<Item>[]): (page: number) => Promise<PageResult<Item>> {
  return async (page) => results[page - 1] ?? { items: [] };
}

function options(overrides: Partial<PaginateOptions<Item>>): PaginateOptions<Item> {
  return {
    site: "gupy",
    signal: new AbortController().signal,
    maxPages: 10,
    resultsWanted: 100,
    ordering: "unordered",
    fetchPage: pages(),
    postedAt: (item) => item.postedAt,
    logger,
    ...overrides,
  };
}

describe("paginate", () => {
  it("should stop once results wanted is reached", async () => {
    const result = await paginate(
      options({
        resultsWanted: 5,
        fetchPage: pages({ items: items("a", 3) }, { items: items("b", 3) }, { items: items("c", 3) }),
      }),
    );

    expect(result.items.map((i) => i.id)).toEqual(["a0", "a1", "a2", "b0", "b1"]);
    expect(result.pagesFetched).toBe(2);
    expect(result.stopReason).toBe("results-wanted");
  });

  it("should stop on an empty page", async () => {
    const result = await paginate(options({ fetchPage: pages({ items: items("a", 2) }, { items: [] }) }));

    expect(result.items).toHaveLength(2);
    expect(result.pagesFetched).toBe(2);
    expect(result.stopReason).toBe("empty-page");
  });

  it("should stop at the page limit", async () => {
    const result = await paginate(
      options({
        maxPages: 2,
        fetchPage: pages({ items: items("a", 2) }, { items: items("b", 2) }, { items: items("c", 2) }),
      }),
    );

    expect(result.items).toHaveLength(4);
    expect(result.stopReason).toBe("page-limit");
  });

  it("should stop when the source reports the last page", async () => {
    const result = await paginate(
      options({ fetchPage: pages({ items: items("a", 2), hasMore: false }, { items: items("b", 2) }) }),
    );

    expect(result.items).toHaveLength(2);
    expect(result.pagesFetched).toBe(1);
    expect(result.stopReason).toBe("last-page");
  });

  it("should stop at the age cutoff for newest-first sources", async () => {
    const result = await paginate(
      options({
        ordering: "newest-first",
        cutoff: CUTOFF,
        fetchPage: pages(
          { items: [...items("new", 1, NEW), ...items("old", 1, OLD)] },
          { items: items("never", 2, NEW) },
        ),
      }),
    );

    expect(result.items.map((i) => i.id)).toEqual(["new0"]);
    expect(result.pagesFetched).toBe(1);
    expect(result.stopReason).toBe("age-cutoff");
  });

  it("should drop old postings and keep scanning for unordered sources", async () => {
    const result = await paginate(
      options({
        maxPages: 2,
        cutoff: CUTOFF,
        fetchPage: pages(
          { items: [...items("old", 1, OLD), ...items("new", 1, NEW)] },
          { items: [...items("later", 1, NEW), ...items("undated", 1)] },
        ),
      }),
    );

    expect(result.items.map((i) => i.id)).toEqual(["new0", "later0", "undated0"]);
    expect(result.stopReason).toBe("page-limit");
  });

  it("should not count items rejected by the keep filter", async () => {
    const result = await paginate(
      options({
        resultsWanted: 2,
        keep: (item) => !item.id.startsWith("x"),
        fetchPage: pages({ items: [...items("x", 3), ...items("a", 1)] }, { items: items("b", 3) }),
      }),
    );

    expect(result.items.map((i) => i.id)).toEqual(["a0", "b0"]);
    expect(result.pagesFetched).toBe(2);
  });

  it("should keep earlier items and report a page failure", async () => {
    const warn = vi.fn();
    const result = await paginate(
      options({
        logger: { ...logger, warn },
        fetchPage: async (page) => {
          if (page === 1) return { items: items("a", 2) };
          throw new SourceError("gupy", "SourceBlocked", "HTTP 403");
        },
      }),
    );

    expect(result.items).toHaveLength(2);
    expect(result.pagesFetched).toBe(1);
    expect(result.stopReason).toBe("error");
    expect(result.failure).toEqual({ site: "gupy", kind: "SourceBlocked", message: "gupy: HTTP 403" });
    expect(warn).toHaveBeenCalledWith("Page fetch failed, stopping pagination", {
      page: 2,
      kind: "SourceBlocked",
      error: "gupy: HTTP 403",
      pagesFetched: 1,
      itemsFetched: 2,
    });
  });

  it("should classify unexpected errors as network failures", async () => {
    const result = await paginate(
      options({
        fetchPage: async () => {
          throw new Error("socket hang up");
        },
      }),
    );

    expect(result.failure).toEqual({
      site: "gupy",
      kind: "SourceNetworkError",
      message: "socket hang up",
    });
    expect(result.pagesFetched).toBe(0);
  });

  it("should propagate aborts", async () => {
    const controller = new AbortController();
    const result = paginate(
      options({
        signal: controller.signal,
        fetchPage: async () => {
          controller.abort(new Error("deadline"));
          throw new Error("deadline");
        },
      }),
    );

    await expect(result).rejects.toThrow("deadline");
  });
});
