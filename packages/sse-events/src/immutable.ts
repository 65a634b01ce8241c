/**
 * Deep freezing for event payloads.
 *
 * Typed arrays cannot be frozen. Payloads hold bytes only inside value
 * objects (Digest, PublicKey, Signature, Bytes) that copy on the way in and
 * out, so the arrays themselves are never handed to a caller.
 *
 * Every reachable object is visited, including ones a caller froze
 * shallowly before handing them over.
 */

export function freezeDeep<T>(value: T): T {
  freezeReachable(value, new WeakSet());
  return value;
}

function freezeReachable(value: unknown, visited: WeakSet<object>): void {
  if (value === null || typeof value !== "object" || ArrayBuffer.isView(value)) {
    return;
  }
  if (visited.has(value)) {
    return;
  }
  visited.add(value);

  Object.freeze(value);
  for (const key of Reflect.ownKeys(value)) {
    freezeReachable(Reflect.get(value, key), visited);
  }
}
