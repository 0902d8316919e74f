/**
 * Wire Frame
 *
 * One frame on the wire:
 *
 * | offset | size | field                                  |
 * |--------|------|----------------------------------------|
 * | 0      | 4    | type id, unsigned, little-endian       |
 * | 4      | 4    | payload length, unsigned, little-endian|
 * | 8      | n    | payload                                |
 *
 * Payloads are capped at 16 MiB.
 */

import { Effect, Schema, pipe } from 'effect';
import { FrameTooLarge, InvalidTypeId } from './errors';

export const HEADER_SIZE = 8;

export const MAX_PAYLOAD_SIZE = 16 * 1024 * 1024;

export const MAX_TYPE_ID = 0xffffffff;

export interface Frame {
  readonly typeId: number;
  readonly payload: Uint8Array;
}

export interface FrameHeader {
  readonly typeId: number;
  readonly payloadLength: number;
}

export const TypeId = pipe(Schema.Int, Schema.between(0, MAX_TYPE_ID));

const isTypeId = Schema.is(TypeId);

export const validateTypeId = (typeId: number): Effect.Effect<number, InvalidTypeId> =>
  isTypeId(typeId)
    ? Effect.succeed(typeId)
    : Effect.fail(
        new InvalidTypeId({
          message: `Type id must be an integer between 0 and ${MAX_TYPE_ID}`,
          typeId,
        })
      );

export const frameTooLarge = (payloadLength: number) =>
  new FrameTooLarge({
    message: `Payload of ${payloadLength} bytes exceeds the ${MAX_PAYLOAD_SIZE} byte limit`,
    payloadLength,
    maxPayloadLength: MAX_PAYLOAD_SIZE,
  });

/**
 * Reads a header from the first HEADER_SIZE bytes.
 */
export const decodeHeader = (bytes: Uint8Array): FrameHeader => {
  const view = new DataView(bytes.buffer, bytes.byteOffset, HEADER_SIZE);
  return {
    typeId: view.getUint32(0, true),
    payloadLength: view.getUint32(4, true),
  };
};

export const encodeFrame = (
  frame: Frame
): Effect.Effect<Uint8Array, FrameTooLarge | InvalidTypeId> =>
  pipe(
    validateTypeId(frame.typeId),
    Effect.filterOrFail(
      () => frame.payload.length <= MAX_PAYLOAD_SIZE,
      () => frameTooLarge(frame.payload.length)
    ),
    Effect.map(() => {
      const bytes = new Uint8Array(HEADER_SIZE + frame.payload.length);
      const view = new DataView(bytes.buffer);
      view.setUint32(0, frame.typeId, true);
      view.setUint32(4, frame.payload.length, true);
      bytes.set(frame.payload, HEADER_SIZE);
      return bytes;
    })
  );
