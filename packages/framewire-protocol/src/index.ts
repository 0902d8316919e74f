/**
 * @framewire/protocol
 *
 * Length-prefixed message framing over any framewire connection, the registry
 * of per-type codecs, and the receive loop that turns a connection's byte
 * stream into ordered message callbacks.
 */

// ============================================================================
// Errors
// ============================================================================

export {
  FrameTooLarge,
  UnknownType,
  MalformedPayload,
  InvalidTypeId,
  ReceiveLoopDisposed,
} from './lib/errors';

// ============================================================================
// Framing
// ============================================================================

export {
  type Frame,
  type FrameHeader,
  HEADER_SIZE,
  MAX_PAYLOAD_SIZE,
  MAX_TYPE_ID,
  TypeId,
  validateTypeId,
  decodeHeader,
  encodeFrame,
} from './lib/frame';

export { receiveFrame } from './lib/frame-receiver';

export { type SendError, sendFrame, sendMessage } from './lib/frame-sender';

// ============================================================================
// Serialization
// ============================================================================

export {
  type Message,
  type Serializer,
  type Deserializer,
  type MessageCodec,
  SerializationRegistry,
  type SerializationRegistryService,
  makeSerializationRegistry,
  SerializationRegistryDefault,
  schemaCodec,
} from './lib/serialization-registry';

// ============================================================================
// Receive Loop
// ============================================================================

export {
  type ReceiveLoop,
  type ReceiveLoopError,
  type ReceiveLoopOptions,
  type ReceiveLoopState,
  type MessageReceivedHandler,
  type SocketExceptionHandler,
  makeReceiveLoop,
  receiveLoopScoped,
} from './lib/receive-loop';
