export {
  readSearchInputFromEnv,
  readOutputConfig,
  type OutputConfig,
  type OutputFormat,
} from "./env";
