/***
 * EventSink — Where the engines post their notifications.
 *
 * Any append-only sequence works; a plain array is the usual choice.
 * The engines only ever append, in order, and never pop: draining the
 * queue is the owner's job (see Space.pump).
 *
 ***/

export interface EventSink {
  push(...events: object[]): unknown;
}
