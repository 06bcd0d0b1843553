export { aggregateResults, compareRecords, combineProxyUsage, type AggregateInput } from "./aggregateResults";
export { dedupeKey, dedupeRecords } from "./dedupe";
