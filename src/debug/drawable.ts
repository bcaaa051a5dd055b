/**
 * Debug Drawing
 *
 * Renderers implement `DrawVisitor`; anything that wants to appear on a
 * debug overlay implements `Drawable`. The quadtree itself knows nothing
 * about either: `QuadTreeOverlay` adapts its traversal.
 */

import type { CircleBody } from '../core/types';
import type { Rect } from '../spatial/bounds';
import type { QuadTree } from '../spatial/quad-tree';

export interface DrawVisitor {
    rect(region: Rect, depth: number): void;
    circle(x: number, y: number, radius: number): void;
}

export interface Drawable {
    draw(visitor: DrawVisitor): void;
}

/** Draws every node region of a tree, parents first. */
export class QuadTreeOverlay implements Drawable {
    constructor(private readonly tree: QuadTree) {}

    draw(visitor: DrawVisitor): void {
        this.tree.traverse((region, depth) => visitor.rect(region, depth));
    }
}

export function bodyDrawable(body: CircleBody): Drawable {
    return {
        draw(visitor: DrawVisitor): void {
            visitor.circle(body.position.x, body.position.y, body.radius);
        },
    };
}

export interface RegionEntry {
    region: Rect;
    depth: number;
    isLeaf: boolean;
}

/** Depth-first list of node regions, for renderers that want plain data. */
export function collectRegions(tree: QuadTree): RegionEntry[] {
    const entries: RegionEntry[] = [];
    tree.traverse((region, depth, isLeaf) => entries.push({ region, depth, isLeaf }));
    return entries;
}
