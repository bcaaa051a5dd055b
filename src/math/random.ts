/**
 * Deterministic Random
 *
 * xorshift-style generator over two 32-bit words. Same seed = same
 * sequence. Each consumer is handed its own source.
 */

/** Uniform float in [0, 1). */
export type RandomSource = () => number;

export interface RandomState {
    s0: number;
    s1: number;
}

/** splitmix32 step, used only to spread the seed over both state words */
function splitmix32(seed: number): number {
    let z = (seed + 0x9e3779b9) | 0;
    z = Math.imul(z ^ (z >>> 16), 0x85ebca6b);
    z = Math.imul(z ^ (z >>> 13), 0xc2b2ae35);
    return (z ^ (z >>> 16)) >>> 0;
}

export function seedRandomState(seed: number): RandomState {
    const s0 = splitmix32(seed);
    const s1 = splitmix32(s0 ^ 0x6d2b79f5);
    // An all-zero state would only ever produce zeros
    return { s0: s0 || 1, s1: s1 || 2 };
}

/** Advance `state` in place and return the next float in [0, 1). */
export function nextRandom(state: RandomState): number {
    let s1 = state.s0;
    const s0 = state.s1;
    state.s0 = s0;
    s1 ^= s1 << 23;
    s1 ^= s1 >>> 17;
    s1 ^= s0;
    s1 ^= s0 >>> 26;
    state.s1 = s1;
    return ((state.s0 + state.s1) >>> 0) / 4294967296;
}

/**
 * Create a seeded random source.
 *
 * @example
 * const random = createRandom(42);
 * const angle = (random() * 2 - 1) * 0.1;
 */
export function createRandom(seed: number): RandomSource {
    const state = seedRandomState(seed);
    return () => nextRandom(state);
}

/** Uniform float in [min, max). */
export function randomRange(random: RandomSource, min: number, max: number): number {
    return min + random() * (max - min);
}
