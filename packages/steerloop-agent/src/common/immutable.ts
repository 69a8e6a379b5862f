/**
 * Freezes a value and everything reachable from it. Binary views are left
 * as they are, since their elements cannot be frozen.
 */
export function deepFreeze<T>(value: T): T {
  if (
    value &&
    typeof value === 'object' &&
    !ArrayBuffer.isView(value) &&
    !Object.isFrozen(value)
  ) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

// Detached, frozen copy that later changes to the original cannot reach
export function snapshot<T>(value: T): T {
  return deepFreeze(structuredClone(value));
}
