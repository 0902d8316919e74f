import { Effect, pipe } from 'effect';
import type { Connection, ConnectionError } from '@framewire/transport';
import type { FrameTooLarge } from './errors';
import { HEADER_SIZE, MAX_PAYLOAD_SIZE, decodeHeader, frameTooLarge, type Frame } from './frame';

/**
 * Receives the next whole frame. The header is only peeked until the full frame
 * is buffered, and header and payload are then consumed together, so an
 * interrupted receive leaves the stream exactly where it was.
 */
export const receiveFrame = (
  connection: Connection
): Effect.Effect<Frame, ConnectionError | FrameTooLarge> =>
  pipe(
    connection.peek(HEADER_SIZE),
    Effect.map(decodeHeader),
    Effect.filterOrFail(
      (header) => header.payloadLength <= MAX_PAYLOAD_SIZE,
      (header) => frameTooLarge(header.payloadLength)
    ),
    Effect.flatMap((header) =>
      pipe(
        connection.read(HEADER_SIZE + header.payloadLength),
        Effect.map(
          (bytes): Frame => ({
            typeId: header.typeId,
            payload: bytes.subarray(HEADER_SIZE),
          })
        )
      )
    )
  );
