/** Freezes plain objects and arrays in place, all the way down. Maps and Sets are frozen but not walked. */
export function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== "object" || Object.isFrozen(value)) {
    return value;
  }
  const children: unknown[] = Array.isArray(value)
    ? value
    : value instanceof Map || value instanceof Set
      ? []
      : Object.values(value);
  for (const child of children) {
    deepFreeze(child);
  }
  return Object.freeze(value);
}
