export { DEFAULT_SOURCE_REGISTRY, createSourceAdapter, type SourceRegistry } from "./registry";
export { GupySource } from "./gupy";
export { WellfoundSource } from "./wellfound";
