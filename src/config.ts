import type { HibikiConfig } from './types';

const DEFAULT_MAX_DELIVERY_DEPTH = 64;

// Environment overrides:
//   HIBIKI_MAX_DELIVERY_DEPTH=<n>  nesting depth at which a channel warns about reentrant broadcasts
//   HIBIKI_SILENT=true             no console reports (explicit onError handlers still run)
function readEnvironment(): HibikiConfig {
  const env = typeof process !== 'undefined' ? process.env : undefined;
  const depth = Number.parseInt(env?.HIBIKI_MAX_DELIVERY_DEPTH ?? '', 10);
  return {
    maxDeliveryDepth: Number.isInteger(depth) && depth > 0 ? depth : DEFAULT_MAX_DELIVERY_DEPTH,
    silent: env?.HIBIKI_SILENT === 'true',
  };
}

let current: HibikiConfig = readEnvironment();

export function configure(patch: Partial<HibikiConfig>): void {
  if (patch.maxDeliveryDepth !== undefined) {
    const depth = patch.maxDeliveryDepth;
    if (!Number.isInteger(depth) || depth <= 0) {
      throw new RangeError(`maxDeliveryDepth must be a positive integer, got ${depth}`);
    }
  }
  current = { ...current, ...patch };
}

export function getConfig(): Readonly<HibikiConfig> {
  return { ...current };
}

/** Drops run-time overrides and re-reads the environment. */
export function resetConfig(): void {
  current = readEnvironment();
}
