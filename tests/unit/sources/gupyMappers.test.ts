/**
 * Unit tests for Gupy item guards and mapping
 */

import { describe, it, expect } from "vitest";
import { isGupyJobItem, mapGupyJobToRaw } from "@/sources/gupy";
import { resolveJobType } from "@/normalization/jobType";

describe("Gupy mappers", () => {
  describe("isGupyJobItem", () => {
    it("should accept objects only", () => {
      expect(isGupyJobItem({ name: "Analista" })).toBe(true);
      expect(isGupyJobItem(null)).toBe(false);
      expect(isGupyJobItem("Analista")).toBe(false);
      expect(isGupyJobItem(42)).toBe(false);
      expect(isGupyJobItem([{ name: "Analista" }])).toBe(false);
    });
  });

  describe("mapGupyJobToRaw", () => {
    it("should treat hybrid postings without a vacancy type as full-time", () => {
      const raw = mapGupyJobToRaw({
        name: "Analista de Suporte",
        jobUrl: "https://acme.gupy.io/jobs/301",
        workplaceType: "Hybrid",
      });

      expect(raw).toEqual({
        site: "gupy",
        title: "Analista de Suporte",
        country: "Brasil",
        locationText: "Brasil",
        jobTypes: ["full-time"],
        jobUrl: "https://acme.gupy.io/jobs/301",
        isRemote: false,
      });
      expect(resolveJobType(raw?.jobTypes)).toBe("fulltime");
    });

    it("should let the vacancy type win over the hybrid hint", () => {
      const raw = mapGupyJobToRaw({
        name: "Estágio em Dados",
        jobUrl: "https://acme.gupy.io/jobs/302",
        workplaceType: "hibrido",
        type: "vacancy_type_internship",
      });

      expect(raw?.jobTypes).toEqual(["vacancy_type_internship", "full-time"]);
      expect(resolveJobType(raw?.jobTypes)).toBe("internship");
    });

    it("should map the effective vacancy type to full-time", () => {
      const raw = mapGupyJobToRaw({
        name: "Desenvolvedor",
        jobUrl: "https://acme.gupy.io/jobs/303",
        workplaceType: "on-site",
        type: "vacancy_type_effective",
      });

      expect(raw?.jobTypes).toEqual(["vacancy_type_effective"]);
      expect(resolveJobType(raw?.jobTypes)).toBe("fulltime");
    });

    it("should drop items without a title or URL", () => {
      expect(mapGupyJobToRaw({ name: " ", jobUrl: "https://acme.gupy.io/jobs/304" })).toBeNull();
      expect(mapGupyJobToRaw({ name: "Analista" })).toBeNull();
    });
  });
});
