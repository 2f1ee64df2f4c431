// --------------------------------------------------------------
// Generic Brent's method root-finder for 1D scalar functions
// --------------------------------------------------------------

/**
 * Finds a root of `f` inside [a, b]. Returns null when the interval does not
 * bracket a sign change, when `f` returns a non-finite value, or when
 * `maxIter` is exhausted.
 *
 * `tolAbs` bounds |f(root)|; `xTol` bounds the final bracket half-width.
 */
export function brentRoot(
  f: (x: number) => number,
  a: number,
  b: number,
  tolAbs: number,
  maxIter = 100,
  xTol = tolAbs
): number | null {
  let fa = f(a);
  let fb = f(b);
  if (!isFinite(fa) || !isFinite(fb)) return null;
  if (fa * fb > 0) return null; // not bracketed

  if (Math.abs(fa) < Math.abs(fb)) {
    [a, b] = [b, a];
    [fa, fb] = [fb, fa];
  }

  let c = a, fc = fa, d = b - a, e = d;

  for (let iter = 0; iter < maxIter; iter++) {
    if (Math.abs(fc) < Math.abs(fb)) {
      a = b; b = c; c = a;
      fa = fb; fb = fc; fc = fa;
    }

    const tol = 2 * Number.EPSILON * Math.abs(b) + xTol;
    const m = 0.5 * (c - b);
    if (Math.abs(fb) <= tolAbs || Math.abs(m) <= tol) {
      return b;
    }

    if (Math.abs(e) >= tol && Math.abs(fa) > Math.abs(fb)) {
      // Attempt inverse quadratic / secant step
      const s = fb / fa;
      let p: number, q: number;
      if (a === c) {
        // secant
        p = 2 * m * s;
        q = 1 - s;
      } else {
        // inverse quadratic
        const r = fc / fa;
        const t = fb / fc;
        p = s * (2 * m * r * (r - t) - (b - a) * (t - 1));
        q = (r - 1) * (t - 1) * (s - 1);
      }
      if (p > 0) q = -q;
      p = Math.abs(p);

      const min1 = 3 * m * q - Math.abs(tol * q);
      const min2 = Math.abs(e * q);
      if (2 * p < (min1 < min2 ? min1 : min2)) {
        e = d;
        d = p / q;
      } else {
        d = m;
        e = d;
      }
    } else {
      // Bisection
      d = m;
      e = d;
    }

    a = b;
    fa = fb;
    if (Math.abs(d) > tol) {
      b += d;
    } else {
      b += m > 0 ? tol : -tol;
    }
    fb = f(b);
    if (!isFinite(fb)) return null;
    if ((fb > 0 && fc > 0) || (fb < 0 && fc < 0)) {
      c = a; fc = fa; e = d = b - a;
    }
  }
  return null; // did not converge
}
