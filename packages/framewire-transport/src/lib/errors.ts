/**
 * Transport Error Types
 *
 * Every failure the transport layer can report, grouped by how the loops treat them:
 * - expected shutdown: the loop exits quietly
 * - connection-fatal: reported once through the exception callback, then the loop exits
 * - configuration: returned straight to the caller of bind/connect/register
 */

import { Data } from 'effect';

// ============================================================================
// Expected Shutdown
// ============================================================================

/**
 * The byte stream ended, either because this side closed it or because the
 * peer went away. Reads that cannot be satisfied from buffered bytes fail with this.
 */
export class ConnectionClosed extends Data.TaggedError('ConnectionClosed')<{
  readonly message: string;
  readonly connectionId?: string;
}> {}

// ============================================================================
// Connection-Fatal
// ============================================================================

export class ConnectionIOError extends Data.TaggedError('ConnectionIOError')<{
  readonly message: string;
  readonly connectionId?: string;
  readonly cause?: unknown;
}> {}

// ============================================================================
// Configuration Errors
// ============================================================================

export class InvalidTransport extends Data.TaggedError('InvalidTransport')<{
  readonly message: string;
  readonly expected: string;
  readonly actual: string;
}> {}

export class InvalidEndpoint extends Data.TaggedError('InvalidEndpoint')<{
  readonly message: string;
  readonly input: string;
  readonly cause?: unknown;
}> {}

export class AlreadyBound extends Data.TaggedError('AlreadyBound')<{
  readonly message: string;
  readonly endpoint: string;
}> {}

export class AlreadyRegistered extends Data.TaggedError('AlreadyRegistered')<{
  readonly message: string;
  readonly endpoint: string;
}> {}

export class NotListening extends Data.TaggedError('NotListening')<{
  readonly message: string;
  readonly endpoint: string;
}> {}

export class BindFailed extends Data.TaggedError('BindFailed')<{
  readonly message: string;
  readonly endpoint: string;
  readonly cause?: unknown;
}> {}

export class ConnectFailed extends Data.TaggedError('ConnectFailed')<{
  readonly message: string;
  readonly endpoint: string;
  readonly cause?: unknown;
}> {}

/**
 * Any failure a read or write on an established connection can produce
 */
export type ConnectionError = ConnectionClosed | ConnectionIOError;
