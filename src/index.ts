/**
 * particle-broadphase
 *
 * Quadtree broad phase and circle collision response for point-like
 * particles, rebuilt every simulation tick.
 */

// ============================================
// Math
// ============================================
export * from './math';

// ============================================
// Core
// ============================================
export {
    SimulationConfigSchema,
    QuadTreeOptionsSchema,
    ResolverParamsSchema,
    DEFAULT_CONFIG,
    createConfig,
    parseOrThrow
} from './core/config';
export type { SimulationConfig, QuadTreeOptions, ResolverParams } from './core/config';
export type { EntityId, PointRef, CircleBody, BodyLookup } from './core/types';
export { warnOnce, resetWarnings } from './core/log';

// ============================================
// Spatial Index
// ============================================
export {
    createRect,
    rectFromCenter,
    rectContainsPoint,
    rectIntersects,
    rectQuadrants
} from './spatial/bounds';
export type { Rect } from './spatial/bounds';
export { QuadTree, createQuadTree, enableQuadTreeDebug } from './spatial/quad-tree';
export type { QuadTreeVisitor, QuadTreeStats } from './spatial/quad-tree';

// ============================================
// Collision
// ============================================
export { CollisionResolver, circlesOverlap, probeBounds, enableCollisionDebug } from './collision/resolver';
export type { CollisionContact } from './collision/resolver';

// ============================================
// Simulation
// ============================================
export {
    createWorld,
    addBody,
    removeBody,
    setProbe,
    spawnParticle,
    integrateBodies,
    buildTree,
    stepWorld
} from './sim/world';
export type { World, TickReport, ProbeContacts } from './sim/world';

// ============================================
// Debug Drawing
// ============================================
export { QuadTreeOverlay, bodyDrawable, collectRegions } from './debug/drawable';
export type { DrawVisitor, Drawable, RegionEntry } from './debug/drawable';
