/**
 * E2E: Wellfound adapter against mocked HTML pages
 *
 * Covers __NEXT_DATA__ and anchor parsing, "Page X of Y" pagination and
 * the blocked-page detectors, including proxy rotation on a hidden page.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { HttpRequest } from "@/types";
import { ProxySession } from "@/session";
import { WellfoundSource, buildSearchUrl } from "@/sources/wellfound";
import { validateSearchSpec } from "@/search";
import { createMockHttp, loadFixtureText } from "../helpers/mockHttp";

const NOW = new Date("2024-06-15T12:00:00.000Z");
const SEARCH_URL = "https://wellfound.com/role/l/backend-engineer/porto";

const spec = validateSearchSpec({
  searchTerm: "Backend Engineer",
  location: "Porto",
  sites: ["wellfound"],
  verbose: 0,
});

describe("E2E: Wellfound source (Offline)", () => {
  const mockHttp = createMockHttp();
  const source = new WellfoundSource({ now: () => NOW });

  beforeEach(() => {
    mockHttp.reset();
  });

  it("should build role and location search URLs", () => {
    expect(buildSearchUrl("Backend Engineer", "Porto", 1)).toBe(SEARCH_URL);
    expect(buildSearchUrl("Backend Engineer", "Porto", 2)).toBe(`${SEARCH_URL}?page=2`);
    expect(buildSearchUrl("Backend Engineer", "Remote", 1)).toBe(
      "https://wellfound.com/remote/backend-engineer-jobs",
    );
  });

  it("should parse embedded data then anchors across pages", async () => {
    mockHttp.onCustom("GET", SEARCH_URL, async (req) =>
      req.url.endsWith("?page=2")
        ? loadFixtureText("wellfound/search_anchors.html")
        : loadFixtureText("wellfound/search_next_data.html"),
    );

    const result = await source.fetch(spec, mockHttp.session("wellfound"));

    expect(result.records.map((r) => r.sourceId)).toEqual(["501", "502", "601", "602"]);
    expect(result.pagesFetched).toBe(2);
    expect(result.stopReason).toBe("last-page");
    expect(mockHttp.getRecordedRequests().map((req) => req.url)).toEqual([
      SEARCH_URL,
      `${SEARCH_URL}?page=2`,
    ]);
  });

  it("should map embedded listings", async () => {
    mockHttp.onCustom("GET", SEARCH_URL, async (req) =>
      req.url.endsWith("?page=2")
        ? loadFixtureText("wellfound/search_anchors.html")
        : loadFixtureText("wellfound/search_next_data.html"),
    );

    const result = await source.fetch(spec, mockHttp.session("wellfound"));

    expect(result.records[0]).toEqual({
      site: "wellfound",
      sourceId: "501",
      title: "Backend Engineer",
      company: "Orbit Labs",
      locationText: "Porto, Portugal",
      jobTypes: ["full-time"],
      postedAt: "2 days ago",
      jobUrl: "https://wellfound.com/jobs/501-backend-engineer",
      salaryText: "€50k – €70k",
      isRemote: false,
    });
    expect(result.records[1]).toEqual({
      site: "wellfound",
      sourceId: "502",
      title: "Platform Engineer",
      company: "Nimbus",
      locationText: "Remote, Europe",
      jobTypes: ["contract"],
      jobUrl: "https://wellfound.com/jobs/502",
      isRemote: true,
    });
  });

  it("should map anchor listings with their card context", async () => {
    mockHttp.onCustom("GET", SEARCH_URL, async (req) =>
      req.url.endsWith("?page=2")
        ? loadFixtureText("wellfound/search_anchors.html")
        : loadFixtureText("wellfound/search_next_data.html"),
    );

    const result = await source.fetch(spec, mockHttp.session("wellfound"));

    expect(result.records[2]).toEqual({
      site: "wellfound",
      sourceId: "601",
      title: "Senior Backend Engineer",
      company: "Stellar AI",
      locationText: "Lisbon, Portugal",
      jobTypes: ["Full-time"],
      postedAt: "3 days ago",
      jobUrl: "https://wellfound.com/jobs/601-senior-backend-engineer",
      salaryText: "€60k – €80k",
    });
    expect(result.records[3]).toMatchObject({
      sourceId: "602",
      company: "Quark",
      locationText: "Remote",
      jobTypes: ["Contract"],
    });
  });

  it("should report a captcha page as blocked", async () => {
    mockHttp.on("GET", SEARCH_URL, loadFixtureText("wellfound/blocked.html"));

    const result = await source.fetch(spec, mockHttp.session("wellfound"));

    expect(result.records).toEqual([]);
    expect(result.failure).toEqual({
      site: "wellfound",
      kind: "SourceBlocked",
      message: `wellfound: blocked page from ${SEARCH_URL}`,
    });
  });

  it("should report announced results without listings as blocked", async () => {
    mockHttp.on("GET", SEARCH_URL, loadFixtureText("wellfound/results_without_listings.html"));

    const result = await source.fetch(spec, mockHttp.session("wellfound"));

    expect(result.failure).toEqual({
      site: "wellfound",
      kind: "SourceBlocked",
      message: `wellfound: blocked page from ${SEARCH_URL}`,
    });
  });

  it("should rotate proxies when a page hides its listings", async () => {
    const identities: string[] = [];
    let clock = 1_000_000;
    const session: ProxySession = new ProxySession(
      { site: "wellfound", proxies: ["p1.test:8000", "p2.test:8000"], directDelayMs: 0 },
      new AbortController().signal,
      {
        now: () => clock,
        sleep: async (ms) => {
          clock += ms;
        },
        dispatcherFactory: () => undefined,
        transport: async <T>(req: HttpRequest): Promise<T> => {
          identities.push(session.currentIdentity);
          if (identities.length === 1) {
            return loadFixtureText("wellfound/results_without_listings.html") as T;
          }
          return (
            req.url.endsWith("?page=2")
              ? loadFixtureText("wellfound/search_anchors.html")
              : loadFixtureText("wellfound/search_next_data.html")
          ) as T;
        },
      },
    );

    const result = await source.fetch(spec, session);

    expect(identities).toEqual(["p1.test:8000", "p2.test:8000", "p2.test:8000"]);
    expect(result.records.map((r) => r.sourceId)).toEqual(["501", "502", "601", "602"]);
    expect(result.failure).toBeUndefined();
    expect(session.usage()).toMatchObject({
      requests: 3,
      rotations: 1,
      blockedResponses: 1,
      identitiesUsed: 2,
    });
  });

  it("should keep the first page when the second is rejected", async () => {
    mockHttp.onCustom("GET", SEARCH_URL, async (req) => {
      if (req.url.endsWith("?page=2")) {
        throw new Error("connection reset");
      }
      return loadFixtureText("wellfound/search_next_data.html");
    });

    const result = await source.fetch(spec, mockHttp.session("wellfound"));

    expect(result.records.map((r) => r.sourceId)).toEqual(["501", "502"]);
    expect(result.pagesFetched).toBe(1);
    expect(result.stopReason).toBe("error");
    expect(result.failure?.message).toBe("connection reset");
  });
});
