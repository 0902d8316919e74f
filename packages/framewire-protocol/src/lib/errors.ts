/**
 * Protocol Error Types
 *
 * Per-frame errors (`UnknownType`, `MalformedPayload`) drop one frame and the
 * receive loop carries on. `FrameTooLarge` leaves the stream at an unknown
 * position, so it ends the connection like an I/O error.
 */

import { Data } from 'effect';

export class FrameTooLarge extends Data.TaggedError('FrameTooLarge')<{
  readonly message: string;
  readonly payloadLength: number;
  readonly maxPayloadLength: number;
}> {}

export class UnknownType extends Data.TaggedError('UnknownType')<{
  readonly message: string;
  readonly typeId: number;
}> {}

export class MalformedPayload extends Data.TaggedError('MalformedPayload')<{
  readonly message: string;
  readonly typeId: number;
  readonly cause?: unknown;
}> {}

export class InvalidTypeId extends Data.TaggedError('InvalidTypeId')<{
  readonly message: string;
  readonly typeId: number;
}> {}

export class ReceiveLoopDisposed extends Data.TaggedError('ReceiveLoopDisposed')<{
  readonly message: string;
  readonly connectionId: string;
}> {}
