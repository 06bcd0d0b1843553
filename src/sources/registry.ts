/**
 * Source registry: closed map from SiteId to adapter factory
 */

import type { SourceAdapter } from "@/interfaces";
import type { SiteId } from "@/types";
import { GupySource } from "./gupy";
import { WellfoundSource } from "./wellfound";

export type SourceRegistry = Readonly<Record<SiteId, () => SourceAdapter>>;

export const DEFAULT_SOURCE_REGISTRY: SourceRegistry = {
  gupy: () => new GupySource(),
  wellfound: () => new WellfoundSource(),
};

/**
 * Instantiate the adapter for a site
 */
export function createSourceAdapter(
  site: SiteId,
  registry: SourceRegistry = DEFAULT_SOURCE_REGISTRY,
): SourceAdapter {
  return registry[site]();
}
