/**
 * @sockline/transport-node
 *
 * Node.js socket capabilities for the socket transport.
 * Wraps an already connected `net.Socket`, or any `Duplex`, as a plain or TLS secured socket.
 */

export { makePlainSocket } from './lib/plain-socket';
export { makeSecureSocket, type SecureSocketOptions } from './lib/secure-socket';
export { makeDuplexStream } from './lib/duplex-stream';
