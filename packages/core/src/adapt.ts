/**
 * Argument adapters — give member functions the same call shape as free
 * functions so the other wrappers can take either.
 *
 * Bound receivers are held by reference, never copied: whatever a call
 * mutates on the receiver is visible to the next call.
 */

/**
 * Per-call receiver: `visit(method)(receiver, ...args)` calls
 * `method` with `this` set to `receiver`.
 *
 * Declare a `this` parameter on the method to type the receiver.
 */
export function visit<R, A extends unknown[], T>(
  method: (this: R, ...args: A) => T,
): (receiver: R, ...args: A) => T {
  return (receiver, ...args) => method.call(receiver, ...args);
}

/** Bound receiver: the returned callable takes only the method's own arguments. */
export function bindReceiver<R, A extends unknown[], T>(
  receiver: R,
  method: (this: R, ...args: A) => T,
): (...args: A) => T {
  return (...args) => method.call(receiver, ...args);
}

/** Fix the leading arguments of `fn`. */
export function partial<L extends unknown[], A extends unknown[], T>(
  fn: (...args: [...L, ...A]) => T,
  ...leading: L
): (...args: A) => T {
  return (...args) => fn(...leading, ...args);
}

/** Keys of `R` whose values are functions. */
export type MethodKey<R> = {
  [K in keyof R]-?: R[K] extends (...args: never[]) => unknown ? K : never;
}[keyof R];

/** Call shape of a method once its receiver is bound. */
export type BoundMethod<F> = F extends (...args: infer A) => infer T ? (...args: A) => T : never;

/**
 * Bound receiver, method looked up by name once at binding time.
 * Throws TypeError when `key` does not name a function on `receiver`.
 */
export function bindMethod<R extends object, K extends MethodKey<R>>(
  receiver: R,
  key: K,
): BoundMethod<R[K]>;
export function bindMethod(receiver: object, key: PropertyKey): (...args: unknown[]) => unknown {
  const method: unknown = Reflect.get(receiver, key);
  if (typeof method !== "function") {
    throw new TypeError(`${String(key)} is not a method of the receiver`);
  }
  return (...args) => Reflect.apply(method, receiver, args);
}
