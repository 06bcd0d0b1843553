/**
 * Unit tests for the record normalizer
 */

import { describe, it, expect } from "vitest";
import type { RawJobPosting } from "@/types";
import { buildRecordId, cleanTitle, normalizeRecord, type NormalizeContext } from "@/normalization";

const NOW = new Date("2024-06-15T12:00:00.000Z");

const CTX: NormalizeContext = {
  salaryPolicy: { enabled: true, defaultCurrency: "BRL" },
  descriptionFormat: "plain",
  now: NOW,
};

function gupyPosting(overrides: Partial<RawJobPosting> = {}): RawJobPosting {
  return {
    site: "gupy",
    sourceId: "123",
    title: "Vaga: Desenvolvedor Backend",
    company: "  Acme   Ltda ",
    city: "São Paulo",
    state: "SP",
    country: "Brasil",
    jobTypes: ["vacancy_type_effective"],
    postedAt: "2024-05-01T12:00:00.000Z",
    jobUrl: "https://acme.gupy.io/jobs/123",
    description: {
      content: "<p>Salário: R$ 5.000 a R$ 7.000 por mês</p><p>Contato: RH@Acme.com.br</p>",
      format: "html",
    },
    isRemote: false,
    ...overrides,
  };
}

describe("cleanTitle", () => {
  it("should strip listing prefixes and collapse whitespace", () => {
    expect(cleanTitle("Vaga:  Dev   Backend")).toBe("Dev Backend");
    expect(cleanTitle("Job - Data Engineer")).toBe("Data Engineer");
    expect(cleanTitle("Product Owner")).toBe("Product Owner");
  });
});

describe("buildRecordId", () => {
  it("should prefix the source id with the site", () => {
    expect(buildRecordId({ site: "gupy", sourceId: "42", jobUrl: "https://x.test/1" })).toBe(
      "gupy-42",
    );
  });

  it("should fall back to a stable URL digest", () => {
    const first = buildRecordId({ site: "wellfound", jobUrl: "https://wellfound.com/jobs/1-dev" });
    const second = buildRecordId({ site: "wellfound", jobUrl: "https://wellfound.com/jobs/1-dev" });
    expect(first).toMatch(/^wellfound-[0-9a-f]{16}$/);
    expect(second).toBe(first);
  });
});

describe("normalizeRecord", () => {
  it("should normalize every field of a structured posting", () => {
    const record = normalizeRecord(gupyPosting(), CTX);

    expect(record.id).toBe("gupy-123");
    expect(record.site).toBe("gupy");
    expect(record.title).toBe("Desenvolvedor Backend");
    expect(record.company).toBe("Acme Ltda");
    expect(record.location).toEqual({
      city: "São Paulo",
      state: "SP",
      country: "Brazil",
      text: "São Paulo, SP, Brazil",
    });
    expect(record.jobType).toBe("fulltime");
    expect(record.postedAt?.toISOString()).toBe("2024-05-01T12:00:00.000Z");
    expect(record.description).toEqual({
      raw: "<p>Salário: R$ 5.000 a R$ 7.000 por mês</p><p>Contato: RH@Acme.com.br</p>",
      rendered: "Salário: R$ 5.000 a R$ 7.000 por mês\nContato: RH@Acme.com.br",
      format: "plain",
    });
    expect(record.compensation).toEqual({
      min: 5000,
      max: 7000,
      currency: "BRL",
      interval: "monthly",
      source: "description",
    });
    expect(record.emails).toEqual(["rh@acme.com.br"]);
    expect(record.isRemote).toBe(false);
  });

  it("should prefer structured compensation over text", () => {
    const record = normalizeRecord(
      gupyPosting({ salary: { min: 9000, max: 8000, currency: "BRL", interval: "monthly" } }),
      CTX,
    );
    expect(record.compensation).toEqual({
      min: 8000,
      max: 9000,
      currency: "BRL",
      interval: "monthly",
      source: "structured",
    });
  });

  it("should prefer listing salary text over the description", () => {
    const record = normalizeRecord(gupyPosting({ salaryText: "R$ 4.000" }), CTX);
    expect(record.compensation).toEqual({
      min: 4000,
      max: 4000,
      currency: "BRL",
      source: "salary-text",
    });
  });

  it("should derive the remote flag from location text when the source gives none", () => {
    const record = normalizeRecord(
      {
        site: "wellfound",
        title: "Backend Engineer",
        locationText: "Remote - Brazil",
        jobUrl: "https://wellfound.com/jobs/9-backend-engineer",
      },
      { ...CTX, salaryPolicy: { enabled: true } },
    );
    expect(record.isRemote).toBe(true);
    expect(record.location).toEqual({ text: "Remote - Brazil" });
    expect(record.jobType).toBe("unknown");
    expect(record.company).toBeUndefined();
    expect(record.compensation).toBeUndefined();
    expect(record.emails).toEqual([]);
  });

  it("should return frozen records", () => {
    const record = normalizeRecord(gupyPosting(), CTX);
    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.location)).toBe(true);
  });
});
