/**
 * Shared entity types.
 *
 * The index only ever sees `PointRef` snapshots; full entity state lives in
 * whatever store the simulation keeps and is reached through `BodyLookup`.
 */

import type { Vec2 } from '../math/vec';

export type EntityId = number;

/** Position snapshot paired with the id it was taken from. */
export interface PointRef {
    id: EntityId;
    x: number;
    y: number;
}

/** Circle approximation of an entity, as seen by the resolver. */
export interface CircleBody {
    id: EntityId;
    position: Vec2;
    velocity: Vec2;
    radius: number;
}

/** Anything that can hand back a body by id. `Map<EntityId, CircleBody>` qualifies. */
export interface BodyLookup {
    get(id: EntityId): CircleBody | undefined;
}
