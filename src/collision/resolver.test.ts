import { describe, test, expect, afterEach, vi } from 'vitest';
import { CollisionResolver, circlesOverlap, probeBounds, enableCollisionDebug } from './resolver';
import { QuadTree } from '../spatial/quad-tree';
import { createRect } from '../spatial/bounds';
import { createRandom, RandomSource } from '../math/random';
import { vec2, vec2AngleBetween, vec2Distance, vec2Length } from '../math/vec';
import { DEFAULT_CONFIG } from '../core/config';
import type { CircleBody } from '../core/types';

// A draw of 0.5 maps to zero jitter
const NO_JITTER: RandomSource = () => 0.5;

function body(id: number, x: number, y: number, radius: number, vx = 0, vy = 0): CircleBody {
  return { id, position: vec2(x, y), velocity: vec2(vx, vy), radius };
}

function lookup(...bodies: CircleBody[]): Map<number, CircleBody> {
  return new Map(bodies.map(b => [b.id, b]));
}

describe('circlesOverlap', () => {
  test('overlapping circles', () => {
    expect(circlesOverlap(body(1, 0, 0, 5), body(2, 9, 0, 5))).toBe(true);
  });

  test('tangent circles do not overlap', () => {
    expect(circlesOverlap(body(1, 0, 0, 5), body(2, 10, 0, 5))).toBe(false);
  });
});

describe('probeBounds', () => {
  test('square of side 2r centered on the probe', () => {
    expect(probeBounds(body(1, 50, 50, 10))).toEqual({ x: 40, y: 40, width: 20, height: 20 });
  });
});

describe('CollisionResolver construction', () => {
  test('rejects damping outside (0, 1)', () => {
    expect(() => new CollisionResolver({ damping: 0, minSpeed: 10, jitterAngle: 0.1 })).toThrow(/^\[Collision\] invalid options: damping:/);
    expect(() => new CollisionResolver({ damping: 1, minSpeed: 0, jitterAngle: 0.1 })).toThrow(/damping/);
    expect(() => new CollisionResolver({ damping: 1.5, minSpeed: 10, jitterAngle: 0.1 })).toThrow(/damping/);
  });

  test('rejects a negative speed floor and jitter', () => {
    expect(() => new CollisionResolver({ damping: 0.9, minSpeed: -1, jitterAngle: 0.1 })).toThrow(/minSpeed/);
    expect(() => new CollisionResolver({ damping: 0.9, minSpeed: 10, jitterAngle: -0.1 })).toThrow(/jitterAngle/);
  });

  test('keeps only the resolver fields of a wider config', () => {
    const resolver = new CollisionResolver(DEFAULT_CONFIG);
    expect(resolver.params).toEqual({ damping: 0.9, minSpeed: 40, jitterAngle: 0.1 });
  });
});

describe('CollisionResolver.resolve', () => {
  const params = { damping: 0.8, minSpeed: 20, jitterAngle: 0.1 };

  test('moving probe pushes a resting candidate to tangency', () => {
    const resolver = new CollisionResolver(params, NO_JITTER);
    const probe = body(1, 50, 50, 10, 0, -50);
    const candidate = body(2, 55, 50, 5);

    const contacts = resolver.resolve(probe, [2], lookup(probe, candidate));

    expect(contacts).toEqual([{ id: 2, normal: { x: 1, y: 0 }, depth: 10, jitter: 0 }]);
    expect(candidate.position).toEqual({ x: 65, y: 50 });
    // (0, -50) has no normal component: reflection keeps it, damping scales it
    expect(candidate.velocity.x).toBeCloseTo(0, 10);
    expect(candidate.velocity.y).toBeCloseTo(-40, 10);
    expect(probe.position).toEqual({ x: 50, y: 50 });
    expect(probe.velocity).toEqual({ x: 0, y: -50 });
  });

  test('approaching candidate bounces back along the normal', () => {
    const resolver = new CollisionResolver({ damping: 0.5, minSpeed: 10, jitterAngle: 0 }, NO_JITTER);
    const probe = body(1, 0, 0, 5);
    const candidate = body(2, 8, 0, 5, -30, 0);

    resolver.resolve(probe, [2], lookup(probe, candidate));

    expect(candidate.position).toEqual({ x: 10, y: 0 });
    expect(candidate.velocity.x).toBeCloseTo(15, 10);
    expect(candidate.velocity.y).toBeCloseTo(0, 10);
  });

  test('slow results are raised to the speed floor', () => {
    const resolver = new CollisionResolver({ damping: 0.5, minSpeed: 40, jitterAngle: 0 }, NO_JITTER);
    const probe = body(1, 0, 0, 5);
    const candidate = body(2, 8, 0, 5, -30, 0);

    resolver.resolve(probe, [2], lookup(probe, candidate));

    expect(candidate.velocity.x).toBeCloseTo(40, 10);
    expect(candidate.velocity.y).toBeCloseTo(0, 10);
  });

  test('a zero result velocity takes the normal direction at the floor', () => {
    const resolver = new CollisionResolver({ damping: 0.9, minSpeed: 20, jitterAngle: 0 }, NO_JITTER);
    const probe = body(1, 0, 0, 5);
    const candidate = body(2, 0, 6, 5);

    resolver.resolve(probe, [2], lookup(probe, candidate));

    expect(candidate.position).toEqual({ x: 0, y: 10 });
    expect(candidate.velocity.x).toBeCloseTo(0, 10);
    expect(candidate.velocity.y).toBeCloseTo(20, 10);
  });

  test('coincident centers separate along +x', () => {
    const resolver = new CollisionResolver(params, NO_JITTER);
    const probe = body(1, 30, 30, 4);
    const candidate = body(2, 30, 30, 6);

    const [contact] = resolver.resolve(probe, [2], lookup(probe, candidate));

    expect(contact.normal).toEqual({ x: 1, y: 0 });
    expect(contact.depth).toBe(10);
    expect(candidate.position).toEqual({ x: 40, y: 30 });
  });

  test('jitter rotates the final velocity by the drawn angle', () => {
    const resolver = new CollisionResolver(params, () => 0);
    const probe = body(1, 50, 50, 10, 0, -50);
    const candidate = body(2, 55, 50, 5);

    const [contact] = resolver.resolve(probe, [2], lookup(probe, candidate));

    expect(contact.jitter).toBeCloseTo(-0.1, 12);
    expect(vec2AngleBetween({ x: 0, y: -40 }, candidate.velocity)).toBeCloseTo(-0.1, 10);
    expect(vec2Length(candidate.velocity)).toBeCloseTo(40, 10);
  });

  test('seeded jitter stays within bounds and keeps tangency and floor', () => {
    const resolver = new CollisionResolver({ damping: 0.9, minSpeed: 25, jitterAngle: 0.1 }, createRandom(3));
    const probe = body(1, 0, 0, 10, 5, 5);

    for (let i = 0; i < 40; i++) {
      const angle = (i / 40) * Math.PI * 2;
      const candidate = body(2, Math.cos(angle) * 8, Math.sin(angle) * 8, 3, -Math.cos(angle) * 4, 0);
      const before = { x: candidate.velocity.x + probe.velocity.x, y: candidate.velocity.y + probe.velocity.y };

      const [contact] = resolver.resolve(probe, [2], lookup(probe, candidate));

      expect(vec2Distance(probe.position, candidate.position)).toBeCloseTo(13, 9);
      expect(vec2Length(candidate.velocity)).toBeGreaterThanOrEqual(25 - 1e-9);
      expect(Math.abs(contact.jitter)).toBeLessThanOrEqual(0.1);

      const n = contact.normal;
      const d = 2 * (before.x * n.x + before.y * n.y);
      const ideal = { x: before.x - d * n.x, y: before.y - d * n.y };
      expect(Math.abs(vec2AngleBetween(ideal, candidate.velocity))).toBeLessThanOrEqual(0.1 + 1e-9);
    }
  });

  test('non-overlapping candidates are left untouched', () => {
    const resolver = new CollisionResolver(params, NO_JITTER);
    const probe = body(1, 0, 0, 5);
    const candidate = body(2, 10, 0, 5, 3, 4);

    expect(resolver.resolve(probe, [2], lookup(probe, candidate))).toEqual([]);
    expect(candidate.position).toEqual({ x: 10, y: 0 });
    expect(candidate.velocity).toEqual({ x: 3, y: 4 });
  });

  test('skips the probe itself, repeated ids and unknown ids', () => {
    const draws = vi.fn(() => 0.5);
    const resolver = new CollisionResolver(params, draws);
    const probe = body(1, 0, 0, 5);
    const candidate = body(2, 3, 0, 5);

    const contacts = resolver.resolve(probe, [1, 2, 2, 99, 2], lookup(probe, candidate));

    expect(contacts.map(c => c.id)).toEqual([2]);
    expect(draws).toHaveBeenCalledTimes(1);
  });

  test('rejects a probe without a positive radius', () => {
    const resolver = new CollisionResolver(params, NO_JITTER);
    expect(() => resolver.resolve(body(1, 0, 0, 0), [], new Map())).toThrow('[Collision] probe radius must be > 0 (body 1 has 0)');
  });

  test('rejects a radius whose bounding square overflows', () => {
    const resolver = new CollisionResolver(params, NO_JITTER);
    const tree = new QuadTree(createRect(0, 0, 100, 100), { capacity: 10, maxDepth: 8 });
    const probe = body(1, 0, 0, 1e308);
    expect(() => resolver.resolveBody(probe, tree, lookup(probe))).toThrow('[Collision] probe radius is too large (body 1 has 1e+308)');
  });

  test('rejects a candidate without a positive radius', () => {
    const resolver = new CollisionResolver(params, NO_JITTER);
    const probe = body(1, 0, 0, 5);
    const candidate = body(2, 1, 0, -2);
    expect(() => resolver.resolve(probe, [2], lookup(probe, candidate))).toThrow(/candidate radius must be > 0/);
  });
});

describe('CollisionResolver.resolveBody', () => {
  test('queries the tree with the probe square and resolves hits', () => {
    const resolver = new CollisionResolver({ damping: 0.8, minSpeed: 20, jitterAngle: 0.1 }, NO_JITTER);
    const probe = body(1, 50, 50, 10, 0, -50);
    const near = body(2, 55, 50, 5);
    const far = body(3, 90, 90, 5, 1, 1);
    const bodies = lookup(probe, near, far);

    const tree = new QuadTree(createRect(0, 0, 100, 100), { capacity: 10, maxDepth: 8 });
    for (const b of bodies.values()) tree.insert(b.id, b.position.x, b.position.y);

    const contacts = resolver.resolveBody(probe, tree, bodies);

    expect(contacts.map(c => c.id)).toEqual([2]);
    expect(near.position).toEqual({ x: 65, y: 50 });
    expect(far.position).toEqual({ x: 90, y: 90 });
    expect(far.velocity).toEqual({ x: 1, y: 1 });
  });
});

describe('collision debug logging', () => {
  afterEach(() => {
    enableCollisionDebug(false);
    vi.restoreAllMocks();
  });

  test('logs each resolved contact when enabled', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    enableCollisionDebug(true);
    const resolver = new CollisionResolver({ damping: 0.8, minSpeed: 20, jitterAngle: 0.1 }, NO_JITTER);
    const probe = body(1, 50, 50, 10, 0, -50);
    const candidate = body(2, 55, 50, 5);

    resolver.resolve(probe, [2], lookup(probe, candidate));

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith('[Collision] probe 1 <-> 2 | depth=10.000 normal=(1.00,0.00) v·n=0.00 jitter=0.000');
  });

  test('stays silent when disabled', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const resolver = new CollisionResolver({ damping: 0.8, minSpeed: 20, jitterAngle: 0.1 }, NO_JITTER);
    const probe = body(1, 50, 50, 10);
    resolver.resolve(probe, [2], lookup(probe, body(2, 55, 50, 5)));
    expect(log).not.toHaveBeenCalled();
  });
});
