/**
 * E2E: Gupy adapter against mocked HTTP
 *
 * Offset pagination, per-run URL dedupe, the client-side location filter,
 * description fetch and failure reporting, all without network calls.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { SearchSpecInput } from "@/types";
import { GupySource } from "@/sources/gupy";
import { GUPY_API_SEARCH_URL } from "@/constants/clients/gupy";
import { validateSearchSpec } from "@/search";
import { createMockHttp, loadFixtureText } from "../helpers/mockHttp";
import searchPage1 from "../fixtures/gupy/search_page_1.json";
import searchPage2 from "../fixtures/gupy/search_page_2.json";

const NOW = new Date("2024-06-15T12:00:00.000Z");

function spec(overrides: Partial<SearchSpecInput> = {}) {
  return validateSearchSpec({
    searchTerm: "Desenvolvedor Backend",
    sites: ["gupy"],
    resultsWanted: 3,
    verbose: 0,
    ...overrides,
  });
}

describe("E2E: Gupy source (Offline)", () => {
  const mockHttp = createMockHttp();
  const source = new GupySource({ now: () => NOW });

  const mockSearchPages = (): void => {
    mockHttp.onCustom("GET", GUPY_API_SEARCH_URL, async (req) =>
      req.query?.offset === 0 ? searchPage1 : searchPage2,
    );
  };

  beforeEach(() => {
    mockHttp.reset();
  });

  it("should page by offset and skip duplicate URLs", async () => {
    mockSearchPages();

    const result = await source.fetch(spec(), mockHttp.session("gupy"));

    expect(result.records.map((r) => r.sourceId)).toEqual(["101", "102", "104"]);
    expect(result.pagesFetched).toBe(2);
    expect(result.stopReason).toBe("results-wanted");
    expect(result.failure).toBeUndefined();

    const queries = mockHttp.getRecordedRequests().map((req) => req.query);
    expect(queries).toEqual([
      { jobName: "Desenvolvedor Backend", limit: 3, offset: 0 },
      { jobName: "Desenvolvedor Backend", limit: 3, offset: 3 },
    ]);
  });

  it("should map API items to raw postings", async () => {
    mockSearchPages();

    const result = await source.fetch(spec(), mockHttp.session("gupy"));

    expect(result.records[0]).toEqual({
      site: "gupy",
      sourceId: "101",
      title: "Desenvolvedor Backend",
      company: "Acme Tecnologia",
      city: "São Paulo",
      state: "São Paulo",
      country: "Brasil",
      locationText: "São Paulo, São Paulo, Brasil",
      jobTypes: ["vacancy_type_effective"],
      postedAt: "2024-06-10T12:00:00.000Z",
      jobUrl: "https://acme.gupy.io/jobs/101",
      jobUrlDirect: "https://acme.gupy.io",
      description: {
        content: "<p>Salário: R$ 8.000 a 10.000 por mês</p><p>Contato: vagas@acme.test</p>",
        format: "html",
      },
      isRemote: false,
    });
    expect(result.records[1].isRemote).toBe(true);
    expect(result.records[2].country).toBe("Brasil");
  });

  it("should filter by location on the client", async () => {
    mockSearchPages();

    const result = await source.fetch(spec({ location: "Curitiba" }), mockHttp.session("gupy"));

    expect(result.records.map((r) => r.sourceId)).toEqual(["102"]);
    expect(result.pagesFetched).toBe(2);
    expect(result.stopReason).toBe("last-page");
  });

  it("should accept every posting for a country-wide location", async () => {
    mockSearchPages();

    const result = await source.fetch(spec({ location: "Brasil" }), mockHttp.session("gupy"));

    expect(result.records).toHaveLength(3);
  });

  it("should fetch job pages for postings without a description", async () => {
    mockSearchPages();
    mockHttp.on("GET", "https://beta.gupy.io/jobs/102", loadFixtureText("gupy/job_page_102.html"));
    mockHttp.onResponse("GET", "https://delta.gupy.io/jobs/104", { status: 404, body: "Not Found" });

    const result = await source.fetch(spec({ fetchDescription: true }), mockHttp.session("gupy"));

    expect(result.records[1].description).toEqual({
      content: "<p>Trabalho remoto com Node.js.</p>",
      format: "html",
    });
    expect(result.records[2].description).toBeUndefined();
    expect(result.failure).toBeUndefined();
  });

  it("should report a blocked response", async () => {
    mockHttp.on("GET", GUPY_API_SEARCH_URL, "<html><body>captcha</body></html>");

    const result = await source.fetch(spec(), mockHttp.session("gupy"));

    expect(result.records).toEqual([]);
    expect(result.pagesFetched).toBe(0);
    expect(result.stopReason).toBe("error");
    expect(result.failure).toEqual({
      site: "gupy",
      kind: "SourceBlocked",
      message: `gupy: blocked page from ${GUPY_API_SEARCH_URL}`,
    });
  });

  it("should report HTTP 403 as blocked", async () => {
    mockHttp.onResponse("GET", GUPY_API_SEARCH_URL, { status: 403, body: "Forbidden" });

    const result = await source.fetch(spec(), mockHttp.session("gupy"));

    expect(result.failure?.kind).toBe("SourceBlocked");
  });

  it("should report a response without a data array as a parse error", async () => {
    mockHttp.on("GET", GUPY_API_SEARCH_URL, { message: "unexpected" });

    const result = await source.fetch(spec(), mockHttp.session("gupy"));

    expect(result.failure).toEqual({
      site: "gupy",
      kind: "SourceParseError",
      message: "gupy: response at offset 0 has no data array",
    });
  });

  it("should skip malformed items and keep the rest of the page", async () => {
    mockHttp.on("GET", GUPY_API_SEARCH_URL, {
      data: [
        null,
        "not a job",
        7,
        ["nested"],
        {
          id: 201,
          name: "Analista de Dados",
          jobUrl: "https://acme.gupy.io/jobs/201",
          publishedDate: "2024-06-14T09:00:00.000Z",
        },
      ],
      pagination: { total: 5 },
    });

    const result = await source.fetch(spec(), mockHttp.session("gupy"));

    expect(result.records.map((r) => r.sourceId)).toEqual(["201"]);
    expect(result.pagesFetched).toBe(1);
    expect(result.stopReason).toBe("last-page");
    expect(result.failure).toBeUndefined();
  });

  it("should keep earlier pages when a later page fails", async () => {
    mockHttp.onCustom("GET", GUPY_API_SEARCH_URL, async (req) => {
      if (req.query?.offset === 0) return searchPage1;
      throw new Error("socket hang up");
    });

    const result = await source.fetch(spec(), mockHttp.session("gupy"));

    expect(result.records.map((r) => r.sourceId)).toEqual(["101", "102"]);
    expect(result.failure).toEqual({
      site: "gupy",
      kind: "SourceNetworkError",
      message: "socket hang up",
    });
  });
});
