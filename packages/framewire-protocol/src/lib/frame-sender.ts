import { Effect, pipe } from 'effect';
import type { ReadonlyDeep } from 'type-fest';
import type { Connection, ConnectionError } from '@framewire/transport';
import type { FrameTooLarge, InvalidTypeId, MalformedPayload, UnknownType } from './errors';
import { encodeFrame, type Frame } from './frame';
import type { Message, SerializationRegistryService } from './serialization-registry';

export type SendError = ConnectionError | FrameTooLarge | InvalidTypeId;

/**
 * Writes one frame as a single write, so frames from concurrent senders never interleave.
 */
export const sendFrame = (connection: Connection, frame: Frame): Effect.Effect<void, SendError> =>
  pipe(encodeFrame(frame), Effect.flatMap(connection.write));

export const sendMessage = (
  connection: Connection,
  registry: SerializationRegistryService,
  message: ReadonlyDeep<Message>
): Effect.Effect<void, SendError | UnknownType | MalformedPayload> =>
  pipe(
    registry.serialize(message),
    Effect.flatMap((frame) => sendFrame(connection, frame))
  );
