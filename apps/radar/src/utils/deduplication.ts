/**
 * Removes duplicate items from an array based on their ID, keeping the first
 * occurrence
 * @template T - Type extending an object with an 'id' property of type string
 * @param {T[]} items - Array of items to deduplicate
 * @returns {T[]} Array with duplicates removed, order preserved
 */
export const deduplicateById = <T extends { id: string }>(
  items: readonly T[]
): T[] => {
  const seen = new Set<string>();
  return items.filter((item) => {
    if (seen.has(item.id)) return false;
    seen.add(item.id);
    return true;
  });
};
