export * from "./logger";
export * from "./search";
export * from "./jobs";
export * from "./sources";
export * from "./session";
export * from "./orchestration";
export * from "./searchJobs";
export * from "./clients/http";
// Source payload types are intentionally NOT exported from the global barrel.
// Import directly from "@/types/clients/<source>" within src/sources/<source>/ only.
