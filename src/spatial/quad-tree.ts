/**
 * QuadTree for Broad-Phase Point Queries
 *
 * Rebuilt from scratch every tick: construct over the world bounds, insert
 * each entity's position, query with a probe's bounding square, drop.
 *
 * Nodes live in an arena of parallel arrays addressed by index. Node 0 is
 * the root. An internal node records the index of its first child; its four
 * children occupy consecutive slots in top-left, top-right, bottom-left,
 * bottom-right order. All walks use an explicit stack, so depth never
 * touches the call stack.
 *
 * Points exactly on a split line are inserted into every child whose closed
 * region contains them. Queries may therefore report such an id more than
 * once; callers that care dedupe.
 */

import type { EntityId, PointRef } from '../core/types';
import { DEFAULT_CONFIG, QuadTreeOptions, QuadTreeOptionsSchema, parseOrThrow } from '../core/config';
import { warnOnce } from '../core/log';
import { Rect, createRect, rectContainsPoint, rectIntersects, rectQuadrants } from './bounds';

// ============================================
// Configuration
// ============================================

const NO_CHILDREN = -1;

const DEFAULT_QUAD_TREE_OPTIONS: QuadTreeOptions = {
    capacity: DEFAULT_CONFIG.capacity,
    maxDepth: DEFAULT_CONFIG.maxDepth,
};

let quadTreeDebugEnabled = false;

/** Log splits and depth-ceiling overflows to the console. */
export function enableQuadTreeDebug(enabled: boolean): void {
    quadTreeDebugEnabled = enabled;
}

// ============================================
// Types
// ============================================

/** Called once per node, parents before children. */
export type QuadTreeVisitor = (region: Rect, depth: number, isLeaf: boolean) => void;

export interface QuadTreeStats {
    nodeCount: number;
    leafCount: number;
    splitCount: number;
    maxDepth: number;
    /** Stored point references; boundary ties count once per leaf */
    pointCount: number;
}

// ============================================
// QuadTree
// ============================================

export class QuadTree {
    readonly bounds: Rect;
    readonly capacity: number;
    readonly maxDepth: number;

    private regions: Rect[] = [];
    private depths: number[] = [];
    private firstChild: number[] = [];
    private points: PointRef[][] = [];

    private splitCount = 0;
    private inserted = 0;

    constructor(bounds: Rect, options: QuadTreeOptions = DEFAULT_QUAD_TREE_OPTIONS) {
        const { capacity, maxDepth } = parseOrThrow(QuadTreeOptionsSchema, options, 'QuadTree');

        this.bounds = createRect(bounds.x, bounds.y, bounds.width, bounds.height);
        this.capacity = capacity;
        this.maxDepth = maxDepth;
        this.allocate(this.bounds, 0);
    }

    /** Number of insertions the root accepted. */
    get size(): number {
        return this.inserted;
    }

    /**
     * Insert a point. Positions outside the root region are dropped and
     * `false` is returned.
     */
    insert(id: EntityId, x: number, y: number): boolean {
        if (!rectContainsPoint(this.bounds, x, y)) return false;
        this.insertFrom(0, { id, x, y });
        this.inserted++;
        return true;
    }

    /**
     * Insert points in iteration order. Returns how many were accepted.
     */
    insertAll(points: Iterable<PointRef>): number {
        let accepted = 0;
        for (const point of points) {
            if (this.insert(point.id, point.x, point.y)) accepted++;
        }
        return accepted;
    }

    /**
     * Ids of all points held by leaves whose region intersects `region`.
     * Never misses a point inside `region`; may include points outside it.
     */
    query(region: Rect): EntityId[] {
        const result: EntityId[] = [];
        this.collect(region, (point) => result.push(point.id));
        return result;
    }

    /**
     * Same traversal as `query`, returning the stored position snapshots.
     */
    queryPoints(region: Rect): PointRef[] {
        const result: PointRef[] = [];
        this.collect(region, (point) => result.push(point));
        return result;
    }

    /**
     * Depth-first, pre-order walk over every node.
     * Children are visited top-left, top-right, bottom-left, bottom-right.
     */
    traverse(visitor: QuadTreeVisitor): void {
        const stack: number[] = [0];
        while (stack.length > 0) {
            const node = stack.pop();
            if (node === undefined) break;

            const first = this.firstChild[node];
            visitor(this.regions[node], this.depths[node], first === NO_CHILDREN);

            if (first !== NO_CHILDREN) {
                for (let i = 3; i >= 0; i--) stack.push(first + i);
            }
        }
    }

    isLeaf(node: number): boolean {
        if (!Number.isInteger(node) || node < 0 || node >= this.regions.length) {
            throw new Error(`[QuadTree] no node ${node} (tree has ${this.regions.length})`);
        }
        return this.firstChild[node] === NO_CHILDREN;
    }

    getStats(): QuadTreeStats {
        let leafCount = 0;
        let maxDepth = 0;
        let pointCount = 0;

        for (let i = 0; i < this.regions.length; i++) {
            if (this.firstChild[i] === NO_CHILDREN) leafCount++;
            maxDepth = Math.max(maxDepth, this.depths[i]);
            pointCount += this.points[i].length;
        }

        return {
            nodeCount: this.regions.length,
            leafCount,
            splitCount: this.splitCount,
            maxDepth,
            pointCount,
        };
    }

    // ============================================
    // Internals
    // ============================================

    private allocate(region: Rect, depth: number): number {
        const index = this.regions.length;
        this.regions.push(region);
        this.depths.push(depth);
        this.firstChild.push(NO_CHILDREN);
        this.points.push([]);
        return index;
    }

    /**
     * Route `point` down from `start`. The caller guarantees that `start`
     * contains the point.
     */
    private insertFrom(start: number, point: PointRef): void {
        const stack: number[] = [start];

        while (stack.length > 0) {
            const node = stack.pop();
            if (node === undefined) break;

            const first = this.firstChild[node];
            if (first !== NO_CHILDREN) {
                // Reverse push keeps top-left first when a tie hits several children
                for (let i = 3; i >= 0; i--) {
                    if (rectContainsPoint(this.regions[first + i], point.x, point.y)) {
                        stack.push(first + i);
                    }
                }
                continue;
            }

            const held = this.points[node];
            if (held.length < this.capacity) {
                held.push(point);
                continue;
            }

            const region = this.regions[node];
            if (this.depths[node] >= this.maxDepth || region.width === 0 || region.height === 0) {
                // Depth ceiling, or a region too thin to divide: hold beyond capacity
                held.push(point);
                if (quadTreeDebugEnabled) {
                    warnOnce(
                        'quadtree-depth-ceiling',
                        `[QuadTree] leaf ${node} at depth ${this.depths[node]} holds ${held.length} points (capacity ${this.capacity})`
                    );
                }
                continue;
            }

            this.split(node);
            stack.push(node);
        }
    }

    /**
     * Turn leaf `node` into an internal node with four empty children and
     * push its points down.
     */
    private split(node: number): void {
        if (this.firstChild[node] !== NO_CHILDREN) {
            throw new Error(`[QuadTree] split() called on internal node ${node}`);
        }

        const depth = this.depths[node] + 1;
        const quadrants = rectQuadrants(this.regions[node]);
        const first = this.allocate(quadrants[0], depth);
        this.allocate(quadrants[1], depth);
        this.allocate(quadrants[2], depth);
        this.allocate(quadrants[3], depth);

        const drained = this.points[node];
        this.points[node] = [];
        this.firstChild[node] = first;
        this.splitCount++;

        if (quadTreeDebugEnabled) {
            console.log(`[QuadTree] split node ${node} at depth ${depth - 1} (${drained.length} points)`);
        }

        for (const point of drained) {
            this.insertFrom(node, point);
        }
    }

    private collect(region: Rect, emit: (point: PointRef) => void): void {
        const stack: number[] = [0];

        while (stack.length > 0) {
            const node = stack.pop();
            if (node === undefined) break;

            if (!rectIntersects(this.regions[node], region)) continue;

            const first = this.firstChild[node];
            if (first === NO_CHILDREN) {
                for (const point of this.points[node]) emit(point);
            } else {
                for (let i = 3; i >= 0; i--) stack.push(first + i);
            }
        }
    }
}

/**
 * Build an empty tree over `bounds` using the quadtree fields of a
 * simulation config.
 */
export function createQuadTree(bounds: Rect, config: QuadTreeOptions): QuadTree {
    return new QuadTree(bounds, { capacity: config.capacity, maxDepth: config.maxDepth });
}
