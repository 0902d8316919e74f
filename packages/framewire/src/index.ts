/**
 * framewire
 *
 * Message framing over TCP and in-process transports in one package.
 *
 * ```typescript
 * import { Effect } from 'effect';
 * import { FramewireLive, connectTo, sendMessage, SerializationRegistry } from 'framewire';
 *
 * const program = Effect.gen(function* () {
 *   const registry = yield* SerializationRegistry;
 *   const connection = yield* connectTo('tcp://127.0.0.1:5555');
 *   yield* sendMessage(connection, registry, { typeId: 1 });
 * }).pipe(Effect.provide(FramewireLive));
 * ```
 */

// ============================================================================
// Main Convenience API
// ============================================================================

export { makeAcceptLoopFor, connect, connectTo, FramewireLive } from './lib/transports';

// ============================================================================
// Re-exports
// ============================================================================

export * from '@framewire/transport';
export * from '@framewire/transport-inmemory';
export * from '@framewire/transport-tcp';
export * from '@framewire/protocol';
