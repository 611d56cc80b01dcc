/**
 * @sockline/transport-inmemory
 *
 * In-process byte streams for the socket transport.
 * Connects two transport connections without a descriptor, with fault injection for tests.
 */

export {
  makeSocketPair,
  makeInMemorySocket,
  makeInMemoryConnectionPair,
  type InMemorySocketOptions,
  type InMemoryConnectionPairOptions,
  type InMemoryConnectionPair,
} from './lib/inmemory-socket';
