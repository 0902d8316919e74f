/**
 * Byte Queue
 *
 * FIFO of bytes with waiting reads. A read of N bytes completes only once N
 * bytes are buffered and then removes exactly those bytes; an interrupted read
 * removes nothing. Both connection implementations buffer inbound bytes here.
 *
 * Offered chunks are kept as they arrive and copied out once, when a read is
 * satisfied. With `ByteQueueOptions` the queue asks its producer to pause once
 * the buffered size reaches the high-water mark and no read is waiting, and to
 * resume when a read needs more bytes or drains it below the mark.
 */

import { Deferred, Effect, Option, pipe } from 'effect';
import type { ConnectionError } from './errors';

// =============================================================================
// Types
// =============================================================================

interface Termination {
  readonly error: ConnectionError;
  // buffered bytes stay readable after a graceful end
  readonly drain: boolean;
}

export interface ByteQueueOptions {
  readonly highWaterMark: number;
  readonly pause: () => void;
  readonly resume: () => void;
}

export interface ByteQueue {
  readonly offer: (bytes: Uint8Array) => Effect.Effect<void, ConnectionError>;
  readonly take: (size: number) => Effect.Effect<Uint8Array, ConnectionError>;
  readonly peek: (size: number) => Effect.Effect<Uint8Array, ConnectionError>;
  /** Lets readers drain what is buffered, then fails them. Returns false if already terminated. */
  readonly end: (error: ConnectionError) => Effect.Effect<boolean>;
  /** Fails readers immediately and drops buffered bytes. Returns false if already terminated. */
  readonly fail: (error: ConnectionError) => Effect.Effect<boolean>;
  readonly size: Effect.Effect<number>;
  readonly isTerminated: Effect.Effect<boolean>;
}

// =============================================================================
// Chunk Storage
// =============================================================================

const COMPACT_AFTER = 1024;

class ChunkList {
  private chunks: Uint8Array[] = [];
  private head = 0;
  private offset = 0;
  private total = 0;

  get length(): number {
    return this.total;
  }

  push(bytes: Uint8Array): void {
    this.chunks.push(bytes);
    this.total += bytes.length;
  }

  copy(size: number): Uint8Array {
    const bytes = new Uint8Array(size);
    let written = 0;
    let index = this.head;
    let start = this.offset;
    while (written < size) {
      const chunk = this.chunks[index];
      if (chunk === undefined) {
        break;
      }
      const part = chunk.subarray(start, start + size - written);
      bytes.set(part, written);
      written += part.length;
      index += 1;
      start = 0;
    }
    return bytes;
  }

  drop(size: number): void {
    let remaining = size;
    while (remaining > 0) {
      const chunk = this.chunks[this.head];
      if (chunk === undefined) {
        break;
      }
      const available = chunk.length - this.offset;
      if (remaining < available) {
        this.offset += remaining;
        remaining = 0;
      } else {
        remaining -= available;
        this.head += 1;
        this.offset = 0;
      }
    }
    this.total -= size;

    if (this.head === this.chunks.length) {
      this.clear();
    } else if (this.head >= COMPACT_AFTER && this.head * 2 >= this.chunks.length) {
      this.chunks = this.chunks.slice(this.head);
      this.head = 0;
    }
  }

  clear(): void {
    this.chunks = [];
    this.head = 0;
    this.offset = 0;
    this.total = 0;
  }
}

const wakeAll = (waiters: readonly Deferred.Deferred<void>[]): Effect.Effect<void> =>
  Effect.forEach(waiters, (waiter) => Deferred.succeed(waiter, undefined), { discard: true });

// =============================================================================
// Constructor
// =============================================================================

/**
 * Every state change below happens inside a single synchronous step, so reads,
 * offers and terminations never observe each other half done.
 */
export const makeByteQueue = (options?: ByteQueueOptions): Effect.Effect<ByteQueue> =>
  Effect.sync(() => {
    const buffered = new ChunkList();
    let termination: Option.Option<Termination> = Option.none();
    let waiters: Deferred.Deferred<void>[] = [];
    let paused = false;

    const setPaused = (next: boolean): void => {
      if (options !== undefined && paused !== next) {
        paused = next;
        if (next) {
          options.pause();
        } else {
          options.resume();
        }
      }
    };

    const takeWaiters = (): readonly Deferred.Deferred<void>[] => {
      const woken = waiters;
      waiters = [];
      return woken;
    };

    const tryRead = (
      size: number,
      consume: boolean,
      waiter: Deferred.Deferred<void>
    ): Effect.Effect<Option.Option<Uint8Array>, ConnectionError> =>
      Effect.suspend(() => {
        const terminatedHard = Option.exists(termination, (t) => !t.drain);

        if (!terminatedHard && buffered.length >= size) {
          const bytes = buffered.copy(size);
          if (consume) {
            buffered.drop(size);
            if (options !== undefined && buffered.length < options.highWaterMark) {
              setPaused(false);
            }
          }
          return Effect.succeed(Option.some(bytes));
        }

        if (Option.isSome(termination)) {
          return Effect.fail(termination.value.error);
        }
        waiters.push(waiter);
        setPaused(false);
        return Effect.succeed(Option.none());
      });

    const awaitBytes = (
      size: number,
      consume: boolean
    ): Effect.Effect<Uint8Array, ConnectionError> =>
      pipe(
        Deferred.make<void>(),
        Effect.flatMap((waiter) =>
          pipe(
            tryRead(size, consume, waiter),
            Effect.flatMap(
              Option.match({
                onSome: (bytes) => Effect.succeed(bytes),
                onNone: () =>
                  pipe(
                    Deferred.await(waiter),
                    Effect.zipRight(Effect.suspend(() => awaitBytes(size, consume)))
                  ),
              })
            )
          )
        )
      );

    const offer = (bytes: Uint8Array): Effect.Effect<void, ConnectionError> =>
      Effect.suspend(() => {
        if (bytes.length === 0) {
          return Effect.void;
        }
        if (Option.isSome(termination)) {
          return Effect.fail(termination.value.error);
        }
        // the caller keeps ownership of its buffer
        buffered.push(Uint8Array.from(bytes));
        const woken = takeWaiters();
        if (options !== undefined && woken.length === 0 && buffered.length >= options.highWaterMark) {
          setPaused(true);
        }
        return wakeAll(woken);
      });

    const terminate = (next: Termination): Effect.Effect<boolean> =>
      Effect.suspend(() => {
        if (Option.isSome(termination)) {
          return Effect.succeed(false);
        }
        termination = Option.some(next);
        if (!next.drain) {
          buffered.clear();
        }
        return Effect.as(wakeAll(takeWaiters()), true);
      });

    return {
      offer,
      take: (size) => awaitBytes(size, true),
      peek: (size) => awaitBytes(size, false),
      end: (error) => terminate({ error, drain: true }),
      fail: (error) => terminate({ error, drain: false }),
      size: Effect.sync(() => buffered.length),
      isTerminated: Effect.sync(() => Option.isSome(termination)),
    };
  });
