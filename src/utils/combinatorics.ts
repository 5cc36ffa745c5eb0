/**
 * Lazy combinatorics over small word lists
 */

/**
 * Unordered k-subsets of `items`, in lexicographic index order
 */
export function* combinations<T>(items: readonly T[], size: number): Generator<T[]> {
  if (size <= 0 || size > items.length) {
    return;
  }

  const indices = Array.from({ length: size }, (_, i) => i);

  while (true) {
    yield indices.map((i) => items[i]);

    // Rightmost index that can still move forward
    let pos = size - 1;
    while (pos >= 0 && indices[pos] === items.length - size + pos) {
      pos--;
    }
    if (pos < 0) {
      return;
    }

    indices[pos]++;
    for (let j = pos + 1; j < size; j++) {
      indices[j] = indices[j - 1] + 1;
    }
  }
}

/**
 * All orderings of `items`
 */
export function* permutations<T>(items: readonly T[]): Generator<T[]> {
  if (items.length <= 1) {
    yield [...items];
    return;
  }

  for (let i = 0; i < items.length; i++) {
    const rest = [...items.slice(0, i), ...items.slice(i + 1)];
    for (const tail of permutations(rest)) {
      yield [items[i], ...tail];
    }
  }
}

/**
 * Ordered arrangements of every subset whose size is in [minSize, maxSize]
 */
export function* arrangements<T>(
  items: readonly T[],
  minSize: number,
  maxSize: number
): Generator<T[]> {
  const upper = Math.min(maxSize, items.length);
  for (let size = Math.max(minSize, 1); size <= upper; size++) {
    for (const combo of combinations(items, size)) {
      yield* permutations(combo);
    }
  }
}
