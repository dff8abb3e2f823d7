/**
 * pipe — apply decorators to a target, innermost first.
 *
 * `pipe(f, a, b)` is `b(a(f))`, so the last decorator listed is the
 * outermost layer at call time.
 */

export function pipe<F>(target: F): F;
export function pipe<F, G1>(target: F, d1: (fn: F) => G1): G1;
export function pipe<F, G1, G2>(target: F, d1: (fn: F) => G1, d2: (fn: G1) => G2): G2;
export function pipe<F, G1, G2, G3>(
  target: F,
  d1: (fn: F) => G1,
  d2: (fn: G1) => G2,
  d3: (fn: G2) => G3,
): G3;
export function pipe<F, G1, G2, G3, G4>(
  target: F,
  d1: (fn: F) => G1,
  d2: (fn: G1) => G2,
  d3: (fn: G2) => G3,
  d4: (fn: G3) => G4,
): G4;
export function pipe<F, G1, G2, G3, G4, G5>(
  target: F,
  d1: (fn: F) => G1,
  d2: (fn: G1) => G2,
  d3: (fn: G2) => G3,
  d4: (fn: G3) => G4,
  d5: (fn: G4) => G5,
): G5;
export function pipe<F, G1, G2, G3, G4, G5, G6>(
  target: F,
  d1: (fn: F) => G1,
  d2: (fn: G1) => G2,
  d3: (fn: G2) => G3,
  d4: (fn: G3) => G4,
  d5: (fn: G4) => G5,
  d6: (fn: G5) => G6,
): G6;
export function pipe(target: unknown, ...decorators: Array<(fn: unknown) => unknown>): unknown {
  return decorators.reduce((wrapped, decorate) => decorate(wrapped), target);
}
