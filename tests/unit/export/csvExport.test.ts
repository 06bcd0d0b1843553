/**
 * Unit tests for CSV export
 */

import { describe, it, expect } from "vitest";
import type { CanonicalRecord } from "@/types";
import { escapeCsvField, toCsv } from "@/export";

const HEADER =
  '"id","site","title","company","city","state","country","location","job_type","date_posted",' +
  '"job_url","job_url_direct","is_remote","min_amount","max_amount","currency","interval","emails","description"';

const FULL: CanonicalRecord = {
  id: "gupy-1",
  site: "gupy",
  title: 'Dev "Sr"',
  company: "Acme",
  location: { city: "Sao Paulo", state: "SP", country: "Brazil", text: "Sao Paulo, SP" },
  jobType: "fulltime",
  postedAt: new Date("2024-06-10T00:00:00.000Z"),
  jobUrl: "https://gupy.test/jobs/1",
  compensation: { min: 5000, max: 7000, currency: "BRL", interval: "monthly", source: "structured" },
  emails: ["a@x.test", "b@x.test"],
  description: { raw: "<p>Line 1</p>", rendered: "Line 1\nLine, 2", format: "plain" },
  isRemote: false,
};

const MINIMAL: CanonicalRecord = {
  id: "wellfound-2",
  site: "wellfound",
  title: "Designer",
  location: {},
  jobType: "unknown",
  jobUrl: "https://wellfound.test/jobs/2",
  emails: [],
  isRemote: true,
};

describe("escapeCsvField", () => {
  it("should quote strings and double embedded quotes", () => {
    expect(escapeCsvField('say "hi", ok')).toBe('"say ""hi"", ok"');
  });

  it("should write numbers and booleans bare", () => {
    expect(escapeCsvField(1500.5)).toBe("1500.5");
    expect(escapeCsvField(true)).toBe("true");
    expect(escapeCsvField(false)).toBe("false");
  });

  it("should write missing and non-finite values as empty quoted fields", () => {
    expect(escapeCsvField(undefined)).toBe('""');
    expect(escapeCsvField(Number.NaN)).toBe('""');
  });
});

describe("toCsv", () => {
  it("should write only the header for an empty result", () => {
    expect(toCsv({ records: [] })).toBe(`${HEADER}\n`);
  });

  it("should write one row per record", () => {
    const lines = toCsv({ records: [FULL] }).split("\n");

    expect(lines[0]).toBe(HEADER);
    expect(lines[1]).toBe(
      '"gupy-1","gupy","Dev ""Sr""","Acme","Sao Paulo","SP","Brazil","Sao Paulo, SP","fulltime",' +
        '"2024-06-10T00:00:00.000Z","https://gupy.test/jobs/1","",false,5000,7000,"BRL","monthly",' +
        '"a@x.test, b@x.test","Line 1',
    );
    expect(lines[2]).toBe('Line, 2"');
  });

  it("should leave optional fields empty", () => {
    const csv = toCsv({ records: [MINIMAL] });

    expect(csv).toBe(
      `${HEADER}\n` +
        '"wellfound-2","wellfound","Designer","","","","","","unknown","","https://wellfound.test/jobs/2","",true,"","","","","",""\n',
    );
  });
});
