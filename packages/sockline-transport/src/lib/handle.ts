import { Brand, Option } from 'effect';

export type ConnectionId = string & Brand.Brand<'ConnectionId'>;
export const ConnectionId = Brand.nominal<ConnectionId>();

/**
 * Identifies a connection to code that must not keep it alive.
 * Copying a handle is free; `deref` yields the connection only while it still exists.
 */
export interface ConnectionHandle<A extends object = object> {
  readonly id: ConnectionId;
  readonly deref: () => Option.Option<A>;
}

export const makeConnectionHandle = <A extends object>(
  id: ConnectionId,
  target: A
): ConnectionHandle<A> => {
  const ref = new WeakRef(target);
  return {
    id,
    deref: () => Option.fromNullable(ref.deref()),
  };
};
