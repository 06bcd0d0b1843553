export { toCsv, escapeCsvField } from "./csvExport";
export {
  serializeRecord,
  serializeSearchResult,
  type SerializedRecord,
  type SerializedSearchResult,
} from "./jsonExport";
