/**
 * Particle World
 *
 * Minimal per-tick harness around the quadtree and resolver:
 *
 *   spawn -> integrate -> bounce off walls -> build tree -> resolve probes
 *
 * The tree is built fresh inside `stepWorld` and handed back in the tick
 * report; the world never keeps it, so nothing leaks into the next tick.
 */

import type { CircleBody, EntityId } from '../core/types';
import { SimulationConfig, createConfig } from '../core/config';
import { vec2, vec2Rotate } from '../math/vec';
import { RandomSource, createRandom, randomRange } from '../math/random';
import { Rect, createRect } from '../spatial/bounds';
import { QuadTree, createQuadTree } from '../spatial/quad-tree';
import { CollisionContact, CollisionResolver } from '../collision/resolver';

// ============================================
// Types
// ============================================

export interface World {
    readonly bounds: Rect;
    readonly config: SimulationConfig;
    readonly bodies: Map<EntityId, CircleBody>;
    /** Bodies resolved against their neighbours each tick, in insertion order */
    readonly probes: Set<EntityId>;
    readonly random: RandomSource;
    readonly resolver: CollisionResolver;
    tick: number;
    nextId: EntityId;
    /** Fractional particles owed by the spawner */
    spawnBudget: number;
}

export interface ProbeContacts {
    probe: EntityId;
    contacts: CollisionContact[];
}

export interface TickReport {
    tick: number;
    /** This tick's index; drop it once drawn */
    tree: QuadTree;
    /** Bodies the tree accepted */
    inserted: number;
    spawned: EntityId[];
    contacts: ProbeContacts[];
}

// ============================================
// World Lifecycle
// ============================================

export function createWorld(bounds: Rect, overrides: Partial<SimulationConfig> = {}): World {
    const config = createConfig(overrides);
    const random = createRandom(config.seed);
    return {
        bounds: createRect(bounds.x, bounds.y, bounds.width, bounds.height),
        config,
        bodies: new Map(),
        probes: new Set(),
        random,
        resolver: new CollisionResolver(config, random),
        tick: 0,
        nextId: 1,
        spawnBudget: 0,
    };
}

/**
 * Add a body. Ids are taken as given; the world's own counter skips past
 * them so spawned particles never collide with caller-chosen ids.
 */
export function addBody(world: World, body: CircleBody): void {
    if (!Number.isFinite(body.radius) || body.radius <= 0) {
        throw new Error(`[World] body ${body.id} radius must be > 0 (got ${body.radius})`);
    }
    if (world.bodies.has(body.id)) {
        throw new Error(`[World] body ${body.id} already exists`);
    }
    world.bodies.set(body.id, body);
    if (body.id >= world.nextId) world.nextId = body.id + 1;
}

export function removeBody(world: World, id: EntityId): boolean {
    world.probes.delete(id);
    return world.bodies.delete(id);
}

/** Mark a body as a probe (e.g. the player) or clear the mark. */
export function setProbe(world: World, id: EntityId, enabled: boolean): void {
    if (!enabled) {
        world.probes.delete(id);
        return;
    }
    if (!world.bodies.has(id)) {
        throw new Error(`[World] cannot probe unknown body ${id}`);
    }
    world.probes.add(id);
}

/**
 * Spawn one particle at a random point inside the bounds, heading in a
 * random direction at the configured floor speed.
 */
export function spawnParticle(world: World): CircleBody {
    const { bounds, config, random } = world;
    const r = config.particleRadius;

    // Keep the particle inside the walls when the world is wide enough
    const minX = bounds.width > 2 * r ? bounds.x + r : bounds.x;
    const maxX = bounds.width > 2 * r ? bounds.x + bounds.width - r : bounds.x + bounds.width;
    const minY = bounds.height > 2 * r ? bounds.y + r : bounds.y;
    const maxY = bounds.height > 2 * r ? bounds.y + bounds.height - r : bounds.y + bounds.height;

    const heading = randomRange(random, -Math.PI, Math.PI);
    const body: CircleBody = {
        id: world.nextId++,
        position: vec2(randomRange(random, minX, maxX), randomRange(random, minY, maxY)),
        velocity: vec2Rotate(vec2(config.minSpeed, 0), heading),
        radius: r,
    };
    world.bodies.set(body.id, body);
    return body;
}

// ============================================
// Stepping
// ============================================

/**
 * Move every body by its velocity and reflect it off the world walls.
 * Bodies larger than the world are only clamped to its center line.
 */
export function integrateBodies(world: World, dt: number): void {
    const { x, y, width, height } = world.bounds;

    for (const body of world.bodies.values()) {
        const p = body.position;
        const v = body.velocity;
        p.x += v.x * dt;
        p.y += v.y * dt;

        const minX = Math.min(x + body.radius, x + width / 2);
        const maxX = Math.max(x + width - body.radius, x + width / 2);
        const minY = Math.min(y + body.radius, y + height / 2);
        const maxY = Math.max(y + height - body.radius, y + height / 2);

        if (p.x < minX) { p.x = minX; v.x = Math.abs(v.x); }
        else if (p.x > maxX) { p.x = maxX; v.x = -Math.abs(v.x); }

        if (p.y < minY) { p.y = minY; v.y = Math.abs(v.y); }
        else if (p.y > maxY) { p.y = maxY; v.y = -Math.abs(v.y); }
    }
}

/**
 * Rebuild the index over the world bounds from current body positions.
 * Bodies are inserted in id-insertion order, so two worlds in the same
 * state build identical trees.
 */
export function buildTree(world: World): { tree: QuadTree; inserted: number } {
    const tree = createQuadTree(world.bounds, world.config);
    let inserted = 0;
    for (const body of world.bodies.values()) {
        if (tree.insert(body.id, body.position.x, body.position.y)) inserted++;
    }
    return { tree, inserted };
}

/**
 * Advance the simulation by `dt` seconds.
 */
export function stepWorld(world: World, dt: number): TickReport {
    if (!Number.isFinite(dt) || dt < 0) {
        throw new Error(`[World] dt must be a finite number >= 0 (got ${dt})`);
    }

    const spawned: EntityId[] = [];
    world.spawnBudget += world.config.spawnRate * dt;
    while (world.spawnBudget >= 1) {
        world.spawnBudget -= 1;
        spawned.push(spawnParticle(world).id);
    }

    integrateBodies(world, dt);

    const { tree, inserted } = buildTree(world);

    const contacts: ProbeContacts[] = [];
    for (const id of world.probes) {
        const probe = world.bodies.get(id);
        if (!probe) continue;
        contacts.push({ probe: id, contacts: world.resolver.resolveBody(probe, tree, world.bodies) });
    }

    world.tick++;
    return { tick: world.tick, tree, inserted, spawned, contacts };
}
