/**
 * undici dispatcher construction for proxy identities and custom CA bundles
 */

import { readFileSync } from "fs";
import { Agent, ProxyAgent, type Dispatcher } from "undici";
import type { ProxyIdentity } from "@/types";

/**
 * Builds the dispatcher for one identity (null = direct connection).
 * Returns undefined when the global dispatcher should be used.
 */
export type DispatcherFactory = (
  identity: ProxyIdentity | null,
  caCert: string | undefined,
) => Dispatcher | undefined;

/**
 * Read a PEM bundle from disk
 *
 * @throws {Error} When the file cannot be read
 */
export function readCaCert(caCertPath: string): string {
  try {
    return readFileSync(caCertPath, "utf-8");
  } catch (err) {
    throw new Error(
      `Cannot read CA certificate at ${caCertPath}: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }
}

export const createDispatcher: DispatcherFactory = (identity, caCert) => {
  if (identity) {
    return new ProxyAgent({
      uri: identity.uri,
      ...(caCert ? { requestTls: { ca: caCert }, proxyTls: { ca: caCert } } : {}),
    });
  }

  if (caCert) {
    return new Agent({ connect: { ca: caCert } });
  }

  return undefined;
};
