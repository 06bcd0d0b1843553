export {
  InvalidSpecError,
  SourceError,
  AllSourcesFailedError,
  toSourceFailure,
} from "./searchErrors";
