/**
 * Whether marking `toObsoleteId` as obsoleted by `obsoletingId` would close a
 * loop in the obsoletion chain.
 *
 * `obsoletedByOf` returns the current `obsoletedById` of a publication (null
 * when current or unknown). The chain is followed upwards from the
 * obsoleting publication; reaching the publication being obsoleted means a
 * cycle.
 */
export const wouldCreateObsoletionCycle = (
  toObsoleteId: number,
  obsoletingId: number,
  obsoletedByOf: (publicationId: number) => number | null
): boolean => {
  const visited = new Set<number>();
  let current: number | null = obsoletingId;
  while (current !== null) {
    if (current === toObsoleteId) {
      return true;
    }
    if (visited.has(current)) {
      return false;
    }
    visited.add(current);
    current = obsoletedByOf(current);
  }
  return false;
};
