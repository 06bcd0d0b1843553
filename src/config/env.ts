/**
 * Environment configuration for the CLI
 *
 * Blank variables count as unset. Values that do not parse are handed to
 * validateSearchSpec unchanged so the error names the offending field.
 */

import type { SearchSpecInput } from "@/types";
import { splitProxyList } from "@/session";

export type OutputFormat = "json" | "csv";

export type OutputConfig = {
  format: OutputFormat;
  /** File to write; stdout when absent */
  path?: string;
};

type Env = Record<string, string | undefined>;

function read(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readInteger(env: Env, key: string): number | string | undefined {
  const value = read(env, key);
  if (value === undefined) return undefined;
  return /^-?\d+$/.test(value) ? parseInt(value, 10) : value;
}

function readBoolean(env: Env, key: string): boolean | string | undefined {
  const value = read(env, key)?.toLowerCase();
  if (value === undefined) return undefined;
  if (value === "true" || value === "1" || value === "yes") return true;
  if (value === "false" || value === "0" || value === "no") return false;
  return value;
}

function readList(env: Env, key: string): string[] | undefined {
  const value = read(env, key);
  if (value === undefined) return undefined;
  return value
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * Build loose search input from SEARCH_* and related variables
 */
export function readSearchInputFromEnv(env: Env = process.env): SearchSpecInput {
  const proxies = splitProxyList(read(env, "PROXIES"));
  return {
    searchTerm: read(env, "SEARCH_TERM"),
    location: read(env, "SEARCH_LOCATION"),
    sites: readList(env, "SEARCH_SITES"),
    resultsWanted: readInteger(env, "RESULTS_WANTED"),
    hoursOld: readInteger(env, "HOURS_OLD"),
    country: read(env, "SEARCH_COUNTRY"),
    fetchDescription: readBoolean(env, "FETCH_DESCRIPTION"),
    descriptionFormat: read(env, "DESCRIPTION_FORMAT")?.toLowerCase(),
    verbose: readInteger(env, "VERBOSE"),
    proxies: proxies.length > 0 ? proxies : undefined,
    caCertPath: read(env, "CA_CERT_PATH"),
    deadlineMs: readInteger(env, "SEARCH_DEADLINE_MS"),
  };
}

/**
 * @throws {Error} When OUTPUT_FORMAT is neither json nor csv
 */
export function readOutputConfig(env: Env = process.env): OutputConfig {
  const rawFormat = read(env, "OUTPUT_FORMAT")?.toLowerCase() ?? "json";
  if (rawFormat !== "json" && rawFormat !== "csv") {
    throw new Error(`OUTPUT_FORMAT must be "json" or "csv", got "${rawFormat}"`);
  }
  const path = read(env, "OUTPUT_PATH");
  return path ? { format: rawFormat, path } : { format: rawFormat };
}
