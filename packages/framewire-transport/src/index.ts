/**
 * @framewire/transport
 *
 * Transport contracts shared by every framewire transport: endpoints, socket
 * configuration, the connection abstraction, the byte queue connections buffer
 * into, the error taxonomy and the accept-loop lifecycle.
 *
 * This package contains no transport of its own. See @framewire/transport-tcp
 * and @framewire/transport-inmemory.
 */

// ============================================================================
// Endpoints
// ============================================================================

export type { Endpoint, TransportKind, TcpEndpoint, InprocEndpoint } from './lib/endpoint';

export {
  tcp,
  inproc,
  isTcp,
  isInproc,
  format as formatEndpoint,
  parse as parseEndpoint,
  validate as validateEndpoint,
  requireTcp,
  requireInproc,
} from './lib/endpoint';

// ============================================================================
// Errors
// ============================================================================

export {
  ConnectionClosed,
  ConnectionIOError,
  InvalidTransport,
  InvalidEndpoint,
  AlreadyBound,
  AlreadyRegistered,
  NotListening,
  BindFailed,
  ConnectFailed,
  type ConnectionError,
} from './lib/errors';

// ============================================================================
// Configuration
// ============================================================================

export {
  type SocketConfiguration,
  makeSocketConfiguration,
  DefaultSocketConfiguration,
  SocketConfigurationConfig,
  SocketConfigurationTag,
  SocketConfigurationDefault,
  SocketConfigurationLive,
  toMillisOrZero,
} from './lib/socket-configuration';

export { type NodeType, nodeTypeHasReceiveTimeout } from './lib/node-type';

// ============================================================================
// Connections
// ============================================================================

export {
  type Connection,
  type ConnectOptions,
  type ConnectError,
  type Connector,
  ConnectionId,
  makeConnectionId,
  type DisconnectSignal,
  makeDisconnectSignal,
} from './lib/connection';

export { type ByteQueue, type ByteQueueOptions, makeByteQueue } from './lib/byte-queue';

export {
  type ClientConnectedHandler,
  type ClientDisconnectedHandler,
  ignoreConnected,
  ignoreDisconnected,
  isolateHandler,
} from './lib/handlers';

// ============================================================================
// Accept Loop
// ============================================================================

export {
  type AcceptLoop,
  type BindError,
  type BindOptions,
  type Listener,
  type ListenerOptions,
  type OpenListener,
  makeAcceptLoop,
  bindScoped,
} from './lib/accept-loop';
