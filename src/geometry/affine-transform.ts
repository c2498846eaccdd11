/**
 * 2D affine transforms
 *
 * Linear part stored column-major as (a, b, c, d) = (m11, m21, m12, m22),
 * translation as (e, f):
 *
 *   | a c e |
 *   | b d f |
 *   | 0 0 1 |
 *
 * Instances are immutable; every operation returns a new transform.
 */

export interface Point {
  x: number;
  y: number;
}

export class AffineTransform {
  private constructor(
    readonly a: number,
    readonly b: number,
    readonly c: number,
    readonly d: number,
    readonly e: number,
    readonly f: number
  ) {}

  static identity(): AffineTransform {
    return new AffineTransform(1, 0, 0, 1, 0, 0);
  }

  /** Arbitrary affine map, in the argument order of SVG's `matrix(a b c d e f)`. */
  static matrix(a: number, b: number, c: number, d: number, e = 0, f = 0): AffineTransform {
    return new AffineTransform(a, b, c, d, e, f);
  }

  // ─── Primitives (applied before this transform) ─────────────────────────────

  translate(tx: number, ty = 0): AffineTransform {
    return compose(this, AffineTransform.matrix(1, 0, 0, 1, tx, ty));
  }

  scale(sx: number, sy: number = sx): AffineTransform {
    return compose(this, AffineTransform.matrix(sx, 0, 0, sy));
  }

  rotateDegrees(angle: number, cx = 0, cy = 0): AffineTransform {
    const rad = (angle * Math.PI) / 180;
    const cos = Math.cos(rad);
    const sin = Math.sin(rad);
    const rotation = AffineTransform.matrix(cos, sin, -sin, cos);
    if (cx === 0 && cy === 0) {
      return compose(this, rotation);
    }
    return this.translate(cx, cy).rotateDegrees(angle).translate(-cx, -cy);
  }

  // ─── Queries ────────────────────────────────────────────────────────────────

  applyToPoint(p: Point): Point {
    return {
      x: this.a * p.x + this.c * p.y + this.e,
      y: this.b * p.x + this.d * p.y + this.f,
    };
  }

  /**
   * Rotation angle of the linear part, `atan2(m21, m11)` in degrees.
   * Exact for a (uniformly scaled) rotation only; shear and non-uniform
   * scale give an approximate angle.
   */
  getRotationDegrees(): number {
    return (Math.atan2(this.b, this.a) * 180) / Math.PI;
  }

  isIdentity(eps = 0): boolean {
    return this.equals(AffineTransform.identity(), eps);
  }

  equals(other: AffineTransform, eps = 0): boolean {
    return (
      Math.abs(this.a - other.a) <= eps &&
      Math.abs(this.b - other.b) <= eps &&
      Math.abs(this.c - other.c) <= eps &&
      Math.abs(this.d - other.d) <= eps &&
      Math.abs(this.e - other.e) <= eps &&
      Math.abs(this.f - other.f) <= eps
    );
  }

  toString(): string {
    return `[${this.a},${this.c},${this.e} ; ${this.b},${this.d},${this.f}]`;
  }
}

/**
 * The transform equivalent to applying `inner` first, then `outer`:
 * p ↦ outer(inner(p)).
 */
export function compose(outer: AffineTransform, inner: AffineTransform): AffineTransform {
  return AffineTransform.matrix(
    outer.a * inner.a + outer.c * inner.b,
    outer.b * inner.a + outer.d * inner.b,
    outer.a * inner.c + outer.c * inner.d,
    outer.b * inner.c + outer.d * inner.d,
    outer.a * inner.e + outer.c * inner.f + outer.e,
    outer.b * inner.e + outer.d * inner.f + outer.f
  );
}
