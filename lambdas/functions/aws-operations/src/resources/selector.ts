export const DEFAULT_REPLICA_COUNT = 3;

export interface ResourceSelection {
  candidates: readonly string[];
  selected: string;
  /** Position of `selected` in `candidates`, `null` when a fixed name was requested. */
  index: number | null;
}

/**
 * Candidate names for a resource: the base name, then `-2`, `-3`, ... suffixes.
 */
export function resourceCandidates(baseName: string, replicaCount: number = DEFAULT_REPLICA_COUNT): readonly string[] {
  if (!baseName) {
    throw new Error('Resource base name must not be empty');
  }
  if (!Number.isInteger(replicaCount) || replicaCount < 1) {
    throw new Error(`Replica count must be a positive integer, got ${replicaCount}`);
  }

  const candidates = [baseName];
  for (let replica = 2; replica <= replicaCount; replica++) {
    candidates.push(`${baseName}-${replica}`);
  }
  return Object.freeze(candidates);
}

/**
 * Round-robin pick among the candidates of a resource, driven by wall-clock seconds so that
 * repeated invocations rotate over the replicas without shared state. Every call within the
 * same second returns the same selection.
 */
export function selectResource(
  baseName: string,
  replicaCount: number = DEFAULT_REPLICA_COUNT,
  now: number = Date.now(),
): ResourceSelection {
  return selectCandidate(resourceCandidates(baseName, replicaCount), now);
}

/**
 * Round-robin pick among an explicit list of candidates, e.g. endpoints.
 */
export function selectCandidate(candidates: readonly string[], now: number = Date.now()): ResourceSelection {
  if (candidates.length === 0) {
    throw new Error('At least one candidate is required');
  }
  const index = Math.floor(now / 1000) % candidates.length;
  return { candidates, selected: candidates[index], index };
}

export function fixedResource(name: string): ResourceSelection {
  if (!name) {
    throw new Error('Resource name must not be empty');
  }
  return { candidates: Object.freeze([name]), selected: name, index: null };
}
