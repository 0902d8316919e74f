/**
 * Serialization Registry
 *
 * Maps a numeric type id to the functions that turn a message into a payload
 * and back. Registration is last-writer-wins and there is no removal. Every
 * registration and lookup is a single atomic update of the registry's Ref.
 */

import { Cause, Context, Effect, HashMap, Layer, Option, Ref, Schema, pipe } from 'effect';
import type { ReadonlyDeep } from 'type-fest';
import { validateTypeId, type Frame } from './frame';
import { type InvalidTypeId, MalformedPayload, UnknownType } from './errors';

// =============================================================================
// Types
// =============================================================================

/**
 * Anything that travels in a frame. `typeId` selects the codec.
 */
export interface Message {
  readonly typeId: number;
}

export type Serializer = (message: ReadonlyDeep<Message>) => Effect.Effect<Uint8Array, unknown>;

export type Deserializer = (payload: Uint8Array) => Effect.Effect<Message, unknown>;

export interface MessageCodec {
  readonly serialize: Serializer;
  readonly deserialize: Deserializer;
}

interface RegistryEntry {
  readonly serializer: Option.Option<Serializer>;
  readonly deserializer: Option.Option<Deserializer>;
}

type Entries = HashMap.HashMap<number, RegistryEntry>;

const emptyEntry: RegistryEntry = {
  serializer: Option.none(),
  deserializer: Option.none(),
};

// =============================================================================
// Service Definition
// =============================================================================

export class SerializationRegistry extends Context.Tag('@framewire/SerializationRegistry')<
  SerializationRegistry,
  {
    readonly register: (typeId: number, codec: MessageCodec) => Effect.Effect<void, InvalidTypeId>;
    readonly registerSerializer: (
      typeId: number,
      serializer: Serializer
    ) => Effect.Effect<void, InvalidTypeId>;
    readonly registerDeserializer: (
      typeId: number,
      deserializer: Deserializer
    ) => Effect.Effect<void, InvalidTypeId>;

    /**
     * Encodes a message into a frame using the serializer registered for its type id.
     */
    readonly serialize: (
      message: ReadonlyDeep<Message>
    ) => Effect.Effect<Frame, UnknownType | MalformedPayload>;

    /**
     * Decodes a payload with the deserializer registered for the type id.
     */
    readonly deserialize: (
      typeId: number,
      payload: Uint8Array
    ) => Effect.Effect<Message, UnknownType | MalformedPayload>;

    readonly registeredTypeIds: Effect.Effect<readonly number[]>;
  }
>() {}

export type SerializationRegistryService = Context.Tag.Service<typeof SerializationRegistry>;

// =============================================================================
// Helpers
// =============================================================================

const unknownType = (typeId: number, missing: 'serializer' | 'deserializer') =>
  new UnknownType({ message: `No ${missing} registered for type id ${typeId}`, typeId });

// codecs are application code: failures, defects and throws become MalformedPayload,
// interruption stays interruption
const runCodec = <A>(
  typeId: number,
  action: 'serialize' | 'deserialize',
  run: () => Effect.Effect<A, unknown>
): Effect.Effect<A, MalformedPayload> =>
  pipe(
    Effect.suspend(run),
    Effect.catchAllCause((cause) =>
      Cause.isInterruptedOnly(cause)
        ? Effect.interrupt
        : Effect.fail(
            new MalformedPayload({
              message: `Failed to ${action} type id ${typeId}`,
              typeId,
              cause: Cause.squash(cause),
            })
          )
    )
  );

const lookup = <A>(
  entries: Ref.Ref<Entries>,
  typeId: number,
  select: (entry: RegistryEntry) => Option.Option<A>
): Effect.Effect<Option.Option<A>> =>
  Effect.map(Ref.get(entries), (current) =>
    pipe(HashMap.get(current, typeId), Option.flatMap(select))
  );

// =============================================================================
// Constructor
// =============================================================================

export const makeSerializationRegistry = (): Effect.Effect<SerializationRegistryService> =>
  pipe(
    Ref.make<Entries>(HashMap.empty()),
    Effect.map((entries): SerializationRegistryService => {
      const update = (
        typeId: number,
        change: (entry: RegistryEntry) => RegistryEntry
      ): Effect.Effect<void, InvalidTypeId> =>
        pipe(
          validateTypeId(typeId),
          Effect.zipRight(
            Ref.update(entries, (current) =>
              HashMap.set(
                current,
                typeId,
                change(Option.getOrElse(HashMap.get(current, typeId), () => emptyEntry))
              )
            )
          )
        );

      return {
        register: (typeId, codec) =>
          update(typeId, () => ({
            serializer: Option.some(codec.serialize),
            deserializer: Option.some(codec.deserialize),
          })),

        registerSerializer: (typeId, serializer) =>
          update(typeId, (entry) => ({ ...entry, serializer: Option.some(serializer) })),

        registerDeserializer: (typeId, deserializer) =>
          update(typeId, (entry) => ({ ...entry, deserializer: Option.some(deserializer) })),

        serialize: (message) =>
          pipe(
            lookup(entries, message.typeId, (entry) => entry.serializer),
            Effect.flatMap((serializer): Effect.Effect<Uint8Array, UnknownType | MalformedPayload> =>
              Option.match(serializer, {
                onNone: () => Effect.fail(unknownType(message.typeId, 'serializer')),
                onSome: (serialize) =>
                  runCodec(message.typeId, 'serialize', () => serialize(message)),
              })
            ),
            Effect.map((payload): Frame => ({ typeId: message.typeId, payload }))
          ),

        deserialize: (typeId, payload) =>
          pipe(
            lookup(entries, typeId, (entry) => entry.deserializer),
            Effect.flatMap((deserializer): Effect.Effect<Message, UnknownType | MalformedPayload> =>
              Option.match(deserializer, {
                onNone: () => Effect.fail(unknownType(typeId, 'deserializer')),
                onSome: (deserialize) =>
                  runCodec(typeId, 'deserialize', () => deserialize(payload)),
              })
            )
          ),

        registeredTypeIds: Effect.map(Ref.get(entries), (current) =>
          Array.from(HashMap.keys(current)).sort((a, b) => a - b)
        ),
      };
    })
  );

export const SerializationRegistryDefault = Layer.effect(
  SerializationRegistry,
  makeSerializationRegistry()
);

// =============================================================================
// Schema Codecs
// =============================================================================

/**
 * A codec that writes messages as JSON text in UTF-8, validated by `schema` in
 * both directions.
 */
export const schemaCodec = <M extends Message, I>(schema: Schema.Schema<M, I>): MessageCodec => {
  const json = Schema.parseJson(schema);
  const encoder = new TextEncoder();
  const decoder = new TextDecoder('utf-8', { fatal: true });

  return {
    serialize: (message) =>
      pipe(
        Schema.encodeUnknown(json)(message),
        Effect.map((text) => encoder.encode(text))
      ),
    deserialize: (payload) =>
      pipe(
        Effect.try(() => decoder.decode(payload)),
        Effect.flatMap(Schema.decodeUnknown(json))
      ),
  };
};
