/**
 * Order-preserving grouping.
 *
 * Output must not depend on hash order, so groups come back in the order
 * their first item was seen, and items keep their input order within a group.
 */

export interface Group<TKey, TItem> {
  readonly key: TKey;
  readonly items: readonly TItem[];
}

/**
 * Group items by a string key.
 *
 * @example
 * ```typescript
 * groupBy(["b1", "a1", "b2"], (s) => s[0]);
 * // [{ key: "b", items: ["b1", "b2"] }, { key: "a", items: ["a1"] }]
 * ```
 */
export function groupBy<TItem>(
  items: readonly TItem[],
  keyOf: (item: TItem) => string
): Group<string, TItem>[] {
  return groupByValue(items, keyOf, (key) => key);
}

/**
 * Group items by a structured key compared by value.
 *
 * @param keyOf - Computes the structured key of an item
 * @param identity - Turns a key into the string it is compared by
 * @returns Groups whose `key` is the first key seen for that identity
 */
export function groupByValue<TItem, TKey>(
  items: readonly TItem[],
  keyOf: (item: TItem) => TKey,
  identity: (key: TKey) => string
): Group<TKey, TItem>[] {
  const groups = new Map<string, { key: TKey; items: TItem[] }>();
  for (const item of items) {
    const key = keyOf(item);
    const id = identity(key);
    const group = groups.get(id);
    if (group === undefined) {
      groups.set(id, { key, items: [item] });
    } else {
      group.items.push(item);
    }
  }
  return [...groups.values()];
}
