/***
 * EntityID — Opaque 128-bit entity identifier.
 *
 * Generated once per entity from a random (v4) UUID and never reused.
 * An id is only ever used as a map key: the store resolves it back to
 * the entity, it is never parsed or compared for ordering.
 *
 ***/

import { v4 as uuid_v4, validate as uuid_validate } from "uuid";
import { type Brand, validate_and_cast } from "type_primitives";

export type EntityID = Brand<string, "entity_id">;

export const as_entity_id = (value: string) =>
  validate_and_cast<string, EntityID>(
    value,
    uuid_validate,
    "EntityID must be a UUID string",
  );

export function create_entity_id(): EntityID {
  return as_entity_id(uuid_v4());
}
