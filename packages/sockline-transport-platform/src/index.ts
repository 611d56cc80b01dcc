/**
 * @sockline/transport-platform
 *
 * Socket capability over `@effect/platform` sockets, such as a WebSocket used as a byte tunnel.
 */

export { makePlatformSocket, type PlatformSocketOptions } from './lib/platform-socket';
