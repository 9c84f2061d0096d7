export type KeyedPairs = Iterable<readonly [string, string]>;

export type KeyedComparison = {
  /** Present in the cached set, absent from the live one. */
  missing: Array<{ key: string; cached: string }>;
  /** Present in the live set, absent from the cached one. */
  redundant: Array<{ key: string; live: string }>;
  mismatching: Array<{ key: string; live: string; cached: string }>;
};

type IndexedValue = {
  key: string;
  value: string;
};

const identity = (key: string): string => key;

const indexPairs = (
  pairs: KeyedPairs,
  normalizeKey: (key: string) => string
): Map<string, IndexedValue> => {
  const index = new Map<string, IndexedValue>();
  for (const [key, value] of pairs) {
    const normalized = normalizeKey(key);
    const current = index.get(normalized);
    if (current) {
      // Repeated field lines combine the way HTTP folds them.
      current.value = `${current.value}, ${value}`;
      continue;
    }
    index.set(normalized, { key, value });
  }
  return index;
};

export const compareKeyed = (
  live: KeyedPairs,
  cached: KeyedPairs,
  normalizeKey: (key: string) => string = identity
): KeyedComparison => {
  const liveIndex = indexPairs(live, normalizeKey);
  const cachedIndex = indexPairs(cached, normalizeKey);
  const comparison: KeyedComparison = { missing: [], redundant: [], mismatching: [] };

  for (const [normalized, expected] of cachedIndex) {
    const actual = liveIndex.get(normalized);
    if (!actual) {
      comparison.missing.push({ key: expected.key, cached: expected.value });
    } else if (actual.value !== expected.value) {
      comparison.mismatching.push({ key: expected.key, live: actual.value, cached: expected.value });
    }
  }

  for (const [normalized, actual] of liveIndex) {
    if (!cachedIndex.has(normalized)) {
      comparison.redundant.push({ key: actual.key, live: actual.value });
    }
  }

  return comparison;
};

export const isSameKeyedSet = (comparison: KeyedComparison): boolean => {
  return (
    comparison.missing.length === 0 &&
    comparison.redundant.length === 0 &&
    comparison.mismatching.length === 0
  );
};
