/**
 * Math Module
 *
 * Float vector helpers and deterministic random sources.
 */

// 2D Vectors
export {
    vec2,
    vec2Zero,
    vec2Add,
    vec2Sub,
    vec2Scale,
    vec2Dot,
    vec2Cross,
    vec2LengthSq,
    vec2Length,
    vec2Normalize,
    vec2Distance,
    vec2DistanceSq,
    vec2Reflect,
    vec2Rotate,
    vec2AngleBetween
} from './vec';
export type { Vec2 } from './vec';

// Deterministic Random
export {
    seedRandomState,
    nextRandom,
    createRandom,
    randomRange
} from './random';
export type { RandomSource, RandomState } from './random';
