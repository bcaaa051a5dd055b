/**
 * 2D Vector Helpers
 *
 * Plain float vectors for positions and velocities. Functions return new
 * objects; callers that need in-place writes assign the fields themselves.
 */

// ============================================
// 2D Vector
// ============================================

export interface Vec2 {
    x: number;
    y: number;
}

export function vec2(x: number, y: number): Vec2 {
    return { x, y };
}

export function vec2Zero(): Vec2 {
    return { x: 0, y: 0 };
}

export function vec2Add(a: Vec2, b: Vec2): Vec2 {
    return { x: a.x + b.x, y: a.y + b.y };
}

export function vec2Sub(a: Vec2, b: Vec2): Vec2 {
    return { x: a.x - b.x, y: a.y - b.y };
}

export function vec2Scale(v: Vec2, s: number): Vec2 {
    return { x: v.x * s, y: v.y * s };
}

export function vec2Dot(a: Vec2, b: Vec2): number {
    return a.x * b.x + a.y * b.y;
}

/** 2D cross product (z component of the 3D cross) */
export function vec2Cross(a: Vec2, b: Vec2): number {
    return a.x * b.y - a.y * b.x;
}

export function vec2LengthSq(v: Vec2): number {
    return v.x * v.x + v.y * v.y;
}

export function vec2Length(v: Vec2): number {
    return Math.sqrt(vec2LengthSq(v));
}

export function vec2Normalize(v: Vec2): Vec2 {
    const len = vec2Length(v);
    if (len === 0) return vec2Zero();
    return { x: v.x / len, y: v.y / len };
}

export function vec2Distance(a: Vec2, b: Vec2): number {
    return vec2Length(vec2Sub(b, a));
}

export function vec2DistanceSq(a: Vec2, b: Vec2): number {
    return vec2LengthSq(vec2Sub(b, a));
}

/**
 * Reflect `v` across the line whose unit normal is `n`:
 * v' = v - 2 (v . n) n
 */
export function vec2Reflect(v: Vec2, n: Vec2): Vec2 {
    const d = 2 * vec2Dot(v, n);
    return { x: v.x - d * n.x, y: v.y - d * n.y };
}

/** Rotate counter-clockwise by `angle` radians. */
export function vec2Rotate(v: Vec2, angle: number): Vec2 {
    const c = Math.cos(angle);
    const s = Math.sin(angle);
    return { x: v.x * c - v.y * s, y: v.x * s + v.y * c };
}

/** Signed angle from `a` to `b` in (-PI, PI]. */
export function vec2AngleBetween(a: Vec2, b: Vec2): number {
    return Math.atan2(vec2Cross(a, b), vec2Dot(a, b));
}
