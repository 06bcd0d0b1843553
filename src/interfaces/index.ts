export type { SourceAdapter, SourceSession, ManagedSession } from "./sources/sourceAdapter";
