export * from "./logger";
export * from "./search";
export * from "./session";
export * from "./normalization";
export * from "./searchJobs";
export * from "./clients/http";
