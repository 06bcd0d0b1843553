export {
  runSearch,
  searchJobs,
  deriveRunStatus,
  type SearchDeps,
  type SessionFactory,
} from "./searchOrchestrator";
export { runSourceTask, type SourceTaskContext } from "./sourceTask";
