/**
 * Circle Collision Resolver
 *
 * Narrow phase for one probe body against the candidates a quadtree query
 * returned. Penetration is resolved by placing the candidate tangent to the
 * probe; velocity is reflected about the contact normal, damped, floored
 * and given a small random rotation.
 */

import type { BodyLookup, CircleBody, EntityId } from '../core/types';
import { DEFAULT_CONFIG, ResolverParams, ResolverParamsSchema, parseOrThrow } from '../core/config';
import {
    Vec2,
    vec2Add,
    vec2Distance,
    vec2DistanceSq,
    vec2Dot,
    vec2Length,
    vec2Normalize,
    vec2Reflect,
    vec2Rotate,
    vec2Scale,
    vec2Sub
} from '../math/vec';
import { RandomSource, createRandom } from '../math/random';
import { Rect, rectFromCenter } from '../spatial/bounds';
import type { QuadTree } from '../spatial/quad-tree';

// ============================================
// Types
// ============================================

/** One resolved probe/candidate overlap. */
export interface CollisionContact {
    id: EntityId;
    /** Unit vector from probe center to candidate center */
    normal: Vec2;
    /** Overlap before correction: (rp + rc) - distance */
    depth: number;
    /** Rotation applied to the final velocity (radians) */
    jitter: number;
}

const DEFAULT_RESOLVER_PARAMS: ResolverParams = {
    damping: DEFAULT_CONFIG.damping,
    minSpeed: DEFAULT_CONFIG.minSpeed,
    jitterAngle: DEFAULT_CONFIG.jitterAngle,
};

// Coincident centers have no direction; push along +x
const FALLBACK_NORMAL: Vec2 = { x: 1, y: 0 };

let collisionDebugEnabled = false;

/** Log every resolved contact to the console. */
export function enableCollisionDebug(enabled: boolean): void {
    collisionDebugEnabled = enabled;
}

// ============================================
// Helpers
// ============================================

function assertRadius(body: CircleBody, role: string): void {
    if (!Number.isFinite(body.radius) || body.radius <= 0) {
        throw new Error(`[Collision] ${role} radius must be > 0 (body ${body.id} has ${body.radius})`);
    }
    // The probe square spans 2r
    if (!Number.isFinite(body.radius * 2)) {
        throw new Error(`[Collision] ${role} radius is too large (body ${body.id} has ${body.radius})`);
    }
}

/** Exact overlap: distance between centers < sum of radii. */
export function circlesOverlap(a: CircleBody, b: CircleBody): boolean {
    const sum = a.radius + b.radius;
    return vec2DistanceSq(a.position, b.position) < sum * sum;
}

/** Broad-phase query region for a probe: square of side 2r on its center. */
export function probeBounds(probe: CircleBody): Rect {
    return rectFromCenter(probe.position.x, probe.position.y, probe.radius);
}

// ============================================
// Resolver
// ============================================

export class CollisionResolver {
    readonly params: Readonly<ResolverParams>;
    private random: RandomSource;

    constructor(params: ResolverParams = DEFAULT_RESOLVER_PARAMS, random: RandomSource = createRandom(DEFAULT_CONFIG.seed)) {
        const { damping, minSpeed, jitterAngle } = parseOrThrow(ResolverParamsSchema, params, 'Collision');
        this.params = Object.freeze({ damping, minSpeed, jitterAngle });
        this.random = random;
    }

    /**
     * Resolve `probe` against `candidateIds`, writing new positions and
     * velocities onto the candidate bodies fetched from `bodies`.
     *
     * The probe itself is never moved. Repeated ids (boundary ties) are
     * handled once; the probe's own id and ids with no body are skipped.
     */
    resolve(probe: CircleBody, candidateIds: Iterable<EntityId>, bodies: BodyLookup): CollisionContact[] {
        assertRadius(probe, 'probe');

        const contacts: CollisionContact[] = [];
        const seen = new Set<EntityId>();

        for (const id of candidateIds) {
            if (id === probe.id || seen.has(id)) continue;
            seen.add(id);

            const candidate = bodies.get(id);
            if (!candidate) continue;
            assertRadius(candidate, 'candidate');

            if (!circlesOverlap(probe, candidate)) continue;
            contacts.push(this.respond(probe, candidate));
        }

        return contacts;
    }

    /**
     * Query `tree` with the probe's bounding square and resolve the result.
     */
    resolveBody(probe: CircleBody, tree: QuadTree, bodies: BodyLookup): CollisionContact[] {
        assertRadius(probe, 'probe');
        return this.resolve(probe, tree.query(probeBounds(probe)), bodies);
    }

    private respond(probe: CircleBody, candidate: CircleBody): CollisionContact {
        const { damping, minSpeed, jitterAngle } = this.params;
        const sumRadius = probe.radius + candidate.radius;

        const distance = vec2Distance(probe.position, candidate.position);
        const normal = distance > 0
            ? vec2Normalize(vec2Sub(candidate.position, probe.position))
            : { ...FALLBACK_NORMAL };

        // Place the candidate tangent to the probe
        candidate.position = vec2Add(probe.position, vec2Scale(normal, sumRadius));

        const combined = vec2Add(candidate.velocity, probe.velocity);
        let velocity = vec2Scale(vec2Reflect(combined, normal), damping);

        const speed = vec2Length(velocity);
        if (speed < minSpeed) {
            velocity = speed > 0
                ? vec2Scale(velocity, minSpeed / speed)
                : vec2Scale(normal, minSpeed);
        }

        const jitter = (this.random() * 2 - 1) * jitterAngle;
        candidate.velocity = vec2Rotate(velocity, jitter);

        if (collisionDebugEnabled) {
            console.log(
                `[Collision] probe ${probe.id} <-> ${candidate.id} | depth=${(sumRadius - distance).toFixed(3)} ` +
                `normal=(${normal.x.toFixed(2)},${normal.y.toFixed(2)}) v·n=${vec2Dot(combined, normal).toFixed(2)} ` +
                `jitter=${jitter.toFixed(3)}`
            );
        }

        return { id: candidate.id, normal, depth: sumRadius - distance, jitter };
    }
}
