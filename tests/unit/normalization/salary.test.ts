/**
 * Unit tests for compensation normalization and salary extraction
 */

import { describe, it, expect } from "vitest";
import {
  extractSalaryFromText,
  normalizeStructuredSalary,
  parseAmount,
  resolveCurrency,
  resolveInterval,
} from "@/normalization";

const ENABLED = { enabled: true };
const BRL_DEFAULT = { enabled: true, defaultCurrency: "BRL" };

describe("parseAmount", () => {
  it("should read thousands groups with either separator", () => {
    expect(parseAmount("120,000")).toBe(120000);
    expect(parseAmount("3.000")).toBe(3000);
  });

  it("should use the last separator as decimal point when both appear", () => {
    expect(parseAmount("5.000,00")).toBe(5000);
    expect(parseAmount("5,000.50")).toBe(5000.5);
  });

  it("should treat short trailing groups as decimals", () => {
    expect(parseAmount("12,5")).toBe(12.5);
  });

  it("should expand the k suffix", () => {
    expect(parseAmount("120k")).toBe(120000);
  });

  it("should return undefined for non-numeric text", () => {
    expect(parseAmount("abc")).toBeUndefined();
  });
});

describe("resolveCurrency / resolveInterval", () => {
  it("should map symbols and codes to ISO codes", () => {
    expect(resolveCurrency("R$")).toBe("BRL");
    expect(resolveCurrency("€")).toBe("EUR");
    expect(resolveCurrency("usd")).toBe("USD");
    expect(resolveCurrency("XYZ")).toBeUndefined();
  });

  it("should map interval labels", () => {
    expect(resolveInterval("per_month")).toBe("monthly");
    expect(resolveInterval("Yearly")).toBe("yearly");
    expect(resolveInterval("hora")).toBe("hourly");
    expect(resolveInterval("fortnight")).toBeUndefined();
  });
});

describe("normalizeStructuredSalary", () => {
  it("should reorder swapped bounds", () => {
    expect(
      normalizeStructuredSalary({ min: 9000, max: 7000, currency: "R$", interval: "per_month" }),
    ).toEqual({ min: 7000, max: 9000, currency: "BRL", interval: "monthly", source: "structured" });
  });

  it("should fill both bounds from a single one", () => {
    expect(normalizeStructuredSalary({ min: "5.000,00", currency: "BRL" })).toEqual({
      min: 5000,
      max: 5000,
      currency: "BRL",
      source: "structured",
    });
  });

  it("should drop salaries without a currency", () => {
    expect(normalizeStructuredSalary({ min: 1000, max: 2000 })).toBeUndefined();
  });

  it("should drop salaries without positive amounts", () => {
    expect(normalizeStructuredSalary({ min: 0, currency: "USD" })).toBeUndefined();
  });
});

describe("extractSalaryFromText", () => {
  it("should extract a currency range with its interval", () => {
    expect(extractSalaryFromText("$120,000 - $180,000 per year", ENABLED, "description")).toEqual({
      min: 120000,
      max: 180000,
      currency: "USD",
      interval: "yearly",
      source: "description",
    });
  });

  it("should read Portuguese ranges", () => {
    expect(extractSalaryFromText("R$ 3.000 a 5.000 por mês", BRL_DEFAULT, "salary-text")).toEqual({
      min: 3000,
      max: 5000,
      currency: "BRL",
      interval: "monthly",
      source: "salary-text",
    });
  });

  it("should not read a word starting with a separator as a range", () => {
    expect(extractSalaryFromText("R$ 3.000 anual, 5 vagas", BRL_DEFAULT, "description")).toEqual({
      min: 3000,
      max: 3000,
      currency: "BRL",
      interval: "yearly",
      source: "description",
    });
  });

  it("should read a currency code after the range", () => {
    expect(extractSalaryFromText("50.000 - 70.000 EUR por año", ENABLED, "description")).toEqual({
      min: 50000,
      max: 70000,
      currency: "EUR",
      interval: "yearly",
      source: "description",
    });
  });

  it("should read a single amount with k suffix", () => {
    expect(extractSalaryFromText("Pay: €45k", ENABLED, "salary-text")).toEqual({
      min: 45000,
      max: 45000,
      currency: "EUR",
      source: "salary-text",
    });
  });

  it("should use the default currency for interval-keyword amounts", () => {
    expect(
      extractSalaryFromText("Remuneração: 25 - 30 por hora", BRL_DEFAULT, "description"),
    ).toEqual({ min: 25, max: 30, currency: "BRL", interval: "hourly", source: "description" });
  });

  it("should not guess a currency without a default", () => {
    expect(extractSalaryFromText("Remuneração: 25 - 30 por hora", ENABLED, "description")).toBeUndefined();
  });

  it("should return undefined when nothing matches", () => {
    expect(extractSalaryFromText("Competitive salary and benefits", ENABLED, "description")).toBeUndefined();
  });

  it("should do nothing when the policy is disabled", () => {
    expect(
      extractSalaryFromText("$120,000 - $180,000 per year", { enabled: false }, "description"),
    ).toBeUndefined();
  });
});
