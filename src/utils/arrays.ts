/**
 * Add `value` to the set stored under `key`, creating the set if absent.
 */
export function bucket_add<K, V>(
  map: Map<K, Set<V>>,
  key: K,
  value: V,
): void {
  const bucket = map.get(key);
  if (bucket !== undefined) {
    bucket.add(value);
  } else {
    map.set(key, new Set([value]));
  }
}

/**
 * Delete `value` from the set stored under `key`. The set is dropped
 * from the map once it is empty, so a key is present iff its set is
 * non-empty.
 */
export function bucket_delete<K, V>(
  map: Map<K, Set<V>>,
  key: K,
  value: V,
): void {
  const bucket = map.get(key);
  if (bucket === undefined) return;
  bucket.delete(value);
  if (bucket.size === 0) map.delete(key);
}

/**
 * Insert `value` into an already sorted array, after every element that
 * does not sort strictly after it (binary search, then splice).
 *
 * `compare` follows the Array.prototype.sort contract. Equal elements
 * keep arrival order, which makes repeated inserts a stable sort.
 */
export function insort<T>(
  arr: T[],
  value: T,
  compare: (a: T, b: T) => number,
): void {
  let lo = 0;
  let hi = arr.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (compare(value, arr[mid]) < 0) {
      hi = mid;
    } else {
      lo = mid + 1;
    }
  }
  arr.splice(lo, 0, value);
}

/**
 * Remove, in place, every element matching `predicate`.
 * Returns the number of elements removed.
 */
export function remove_where<T>(
  arr: T[],
  predicate: (value: T) => boolean,
): number {
  let write = 0;
  for (let read = 0; read < arr.length; read++) {
    const value = arr[read];
    if (!predicate(value)) arr[write++] = value;
  }
  const removed = arr.length - write;
  arr.length = write;
  return removed;
}
