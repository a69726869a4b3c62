import { ConfigurationError } from "../errors";
import { MemoryFindingStore } from "./memory";
import { PostgresFindingStore } from "./postgres";
import { RedisFindingStore } from "./redis";
import { FindingStore, redactUrl } from "./types";

export * from "./types";
export { MemoryFindingStore } from "./memory";
export { PostgresFindingStore } from "./postgres";
export { RedisFindingStore } from "./redis";

export const STORE_SCHEMES = ["postgres:", "postgresql:", "redis:", "rediss:", "memory:"] as const;

export type StoreScheme = (typeof STORE_SCHEMES)[number];

function isStoreScheme(value: string): value is StoreScheme {
  return STORE_SCHEMES.some((scheme) => scheme === value);
}

/**
 * Scheme of a store URL, or a ConfigurationError when no backend handles it.
 */
export function assertSupportedStoreUrl(url: string): StoreScheme {
  let scheme: string;
  try {
    scheme = new URL(url).protocol;
  } catch {
    throw new ConfigurationError(`Invalid store URL: ${redactUrl(url)}`);
  }
  if (!isStoreScheme(scheme)) {
    throw new ConfigurationError(`Unsupported store scheme "${scheme}" in ${redactUrl(url)}`);
  }
  return scheme;
}

/**
 * Open a finding store for a URL, picking the backend by scheme.
 *
 * Supported: postgres://, postgresql://, redis://, rediss://, memory://<name>.
 */
export function openStore(url: string): FindingStore {
  switch (assertSupportedStoreUrl(url)) {
    case "postgres:":
    case "postgresql:":
      return new PostgresFindingStore(url);
    case "redis:":
    case "rediss:":
      return new RedisFindingStore(url);
    case "memory:":
      return new MemoryFindingStore(url);
  }
}
