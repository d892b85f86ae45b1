/**
 * Plain-object lookups keyed by codes that come from journal data.
 * They have no prototype, so a code such as "constructor" or "__proto__"
 * is stored as an ordinary key.
 */
export type Lookup<T> = Record<string, T>;

export function createLookup<T>(): Lookup<T> {
  return Object.create(null);
}

export function copyLookup<T>(source: Readonly<Lookup<T>> | undefined): Lookup<T> {
  const copy = createLookup<T>();
  if (source) {
    for (const [key, value] of Object.entries(source)) {
      copy[key] = value;
    }
  }
  return copy;
}
