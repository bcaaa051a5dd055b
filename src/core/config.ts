/**
 * Simulation Configuration
 *
 * Every tunable lives in one explicit value that callers pass into the
 * quadtree, resolver and world constructors. Nothing reads tunables from
 * module state.
 */

import { z } from 'zod';

// ============================================
// Schema
// ============================================

export const SimulationConfigSchema = z.object({
    /** Points a leaf holds before it splits */
    capacity: z.number().int().min(1),
    /** Depth ceiling; leaves at this depth accept points beyond capacity */
    maxDepth: z.number().int().min(0),
    /** Velocity scale applied after reflection */
    damping: z.number().gt(0).lt(1),
    /** Speed floor after damping */
    minSpeed: z.number().finite().nonnegative(),
    /** Max absolute jitter rotation (radians) */
    jitterAngle: z.number().min(0).max(Math.PI),
    /** Radius given to spawned particles */
    particleRadius: z.number().finite().positive(),
    /** Particles spawned per second */
    spawnRate: z.number().finite().nonnegative(),
    /** Seed for the world's random source */
    seed: z.number().int(),
});
export type SimulationConfig = z.infer<typeof SimulationConfigSchema>;

export const DEFAULT_CONFIG: Readonly<SimulationConfig> = Object.freeze({
    capacity: 10,
    maxDepth: 8,
    damping: 0.9,
    minSpeed: 40,
    jitterAngle: 0.1,
    particleRadius: 4,
    spawnRate: 20,
    seed: 1,
});

/** Subset of the config the quadtree uses. */
export const QuadTreeOptionsSchema = SimulationConfigSchema.pick({ capacity: true, maxDepth: true });
export type QuadTreeOptions = z.infer<typeof QuadTreeOptionsSchema>;

/** Subset of the config the collision resolver uses. */
export const ResolverParamsSchema = SimulationConfigSchema.pick({ damping: true, minSpeed: true, jitterAngle: true });
export type ResolverParams = z.infer<typeof ResolverParamsSchema>;

// ============================================
// Construction
// ============================================

/**
 * Validate `value` against `schema`, throwing an `Error` prefixed with `tag`
 * that lists every failing field.
 */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, value: unknown, tag: string): z.infer<T> {
    const result = schema.safeParse(value);
    if (!result.success) {
        const issues = result.error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new Error(`[${tag}] invalid options: ${issues}`);
    }
    return result.data;
}

/**
 * Merge `overrides` onto the defaults and validate the result.
 * Throws on any out-of-range field; values are never coerced.
 */
export function createConfig(overrides: Partial<SimulationConfig> = {}): SimulationConfig {
    const result = SimulationConfigSchema.safeParse({ ...DEFAULT_CONFIG, ...overrides });
    if (!result.success) {
        console.error('[Config] simulation config validation failed:');
        console.error(result.error.format());
        throw new Error(`[Config] invalid simulation config: ${result.error.message}`);
    }
    return result.data;
}
