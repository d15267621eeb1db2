// src/core/checkpoint/failures.ts
import type { DistributionFailures } from '../types/index.js';

/** Folds `incoming` into `target` by per-domain set union. Used while ingesting. */
export function unionFailures(target: DistributionFailures, incoming: DistributionFailures): void {
  for (const [domain, ids] of incoming) {
    if (ids.size === 0) continue;
    const existing = target.get(domain);
    if (existing) {
      for (const id of ids) existing.add(id);
    } else {
      target.set(domain, new Set(ids));
    }
  }
}

export function countFailures(failures: DistributionFailures): number {
  let total = 0;
  for (const ids of failures.values()) total += ids.size;
  return total;
}

export function failuresFor(domains: string[], ids: Iterable<string>): DistributionFailures {
  const all = [...ids];
  return new Map(domains.map((domain) => [domain, new Set(all)]));
}
