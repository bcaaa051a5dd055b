/**
 * Axis-Aligned Rectangles
 *
 * Origin + extents, matching how regions are handed in by the simulation
 * (world bounds) and how the overlay draws them. All predicates treat edges
 * as inclusive, so a point on a shared edge belongs to both sides.
 */

export interface Rect {
    readonly x: number;
    readonly y: number;
    readonly width: number;
    readonly height: number;
}

/**
 * Create a frozen rectangle.
 * Throws when any component is not finite or an extent is negative.
 */
export function createRect(x: number, y: number, width: number, height: number): Rect {
    if (!Number.isFinite(x) || !Number.isFinite(y)) {
        throw new Error(`[Bounds] origin must be finite (got ${x}, ${y})`);
    }
    if (!Number.isFinite(width) || !Number.isFinite(height) || width < 0 || height < 0) {
        throw new Error(`[Bounds] extents must be finite and >= 0 (got ${width} x ${height})`);
    }
    return Object.freeze({ x, y, width, height });
}

/** Square of side `2 * halfExtent` centered on (cx, cy). */
export function rectFromCenter(cx: number, cy: number, halfExtent: number): Rect {
    return createRect(cx - halfExtent, cy - halfExtent, halfExtent * 2, halfExtent * 2);
}

export function rectContainsPoint(rect: Rect, x: number, y: number): boolean {
    return x >= rect.x && x <= rect.x + rect.width &&
           y >= rect.y && y <= rect.y + rect.height;
}

export function rectIntersects(a: Rect, b: Rect): boolean {
    return a.x <= b.x + b.width && a.x + a.width >= b.x &&
           a.y <= b.y + b.height && a.y + a.height >= b.y;
}

/**
 * Split into four equal quadrants: top-left, top-right, bottom-left,
 * bottom-right (y grows downward, as on a canvas).
 */
export function rectQuadrants(rect: Rect): [Rect, Rect, Rect, Rect] {
    const { x, y } = rect;
    const halfW = rect.width / 2;
    const halfH = rect.height / 2;
    return [
        createRect(x, y, halfW, halfH),                   // top-left
        createRect(x + halfW, y, halfW, halfH),           // top-right
        createRect(x, y + halfH, halfW, halfH),           // bottom-left
        createRect(x + halfW, y + halfH, halfW, halfH),   // bottom-right
    ];
}
