// Space
export { Space, type SpaceOptions } from "./space";

// Entities
export { Entity, type EntityOwner } from "./entity/entity";
export { as_entity_id, type EntityID } from "./entity/entity_id";
export { EntityStore, type EntityStoreOptions } from "./store/entity_store";

// Queries
export { Query, QueryResult, type QueryOptions } from "./query/query";
export { MERGE, type MergeFn } from "./query/merge";

// Tags
export { TagRegistry, Marker } from "./tag/tag_registry";

// States
export { StateStore, type StateStoreOptions } from "./state/state_store";

// Systems
export {
  bind,
  BoundHandler,
  type BindOptions,
  type Binding,
  type EventKey,
  type HandlerCallback,
} from "./system/bind";
export {
  define_system,
  type SystemConfig,
  type SystemDescriptor,
  type SystemHandlers,
  type SystemID,
} from "./system/system";

// Dispatch
export { Dispatcher, type DispatcherOptions } from "./dispatch/dispatcher";
export { Handler, type HandlerFn } from "./dispatch/handler";
export {
  compare_priority,
  type Comparable,
  type Priority,
} from "./dispatch/priority";

// Events
export {
  EntityAdded,
  EntityRemoved,
  ComponentAdded,
  ComponentRemoved,
  SystemAdded,
  SystemRemoved,
  EventHandlerAdded,
  EventHandlerRemoved,
  StateAdded,
  StateRemoved,
  register_builtin_keys,
  create_key_registry,
} from "./event/events";
export {
  EventKeyRegistry,
  type KeyFunction,
} from "./event/event_key_registry";
export type { EventSink } from "./event/event_sink";

// Types
export { TypeHierarchy } from "./hierarchy/type_hierarchy";
export { type_of, type Type, type InstancesOf } from "./hierarchy/type";
export type { Equatable } from "./utils/equality";

// Errors
export {
  AppError,
  ECSError,
  ECS_ERROR,
  is_ecs_error,
  is_ecs_error_of,
} from "./utils/error";
