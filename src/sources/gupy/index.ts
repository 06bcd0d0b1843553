export { GupySource, type GupySourceConfig } from "./gupySource";
export { mapGupyJobToRaw, matchesGupyLocation, isGupyListResponse, isGupyJobItem } from "./mappers";
