/**
 * @framewire/transport-tcp
 *
 * Network transport over Node's `net` sockets: a TCP accept loop, a connector,
 * and the NetworkConnection both of them produce.
 */

export {
  type NetworkConnection,
  type SocketOptions,
  isNetworkConnection,
  makeNetworkConnection,
  socketOptionsFor,
} from './lib/network-connection';

export { openTcpListener, makeTcpAcceptLoop, resolveHost } from './lib/tcp-listener';

export { connectTcp } from './lib/tcp-connector';
