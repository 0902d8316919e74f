/**
 * Receive Loop
 *
 * Reads frames from one connection on a daemon fiber, decodes them through a
 * serialization registry and dispatches them, strictly in order, to
 * `onMessageReceived`.
 *
 * Lifecycle: Idle -> Starting -> Running -> Stopping -> Idle
 *
 * - `start` returns once the loop fiber is running
 * - `stop(true)` interrupts the fiber and returns once it has exited; a frame
 *   that was already received is dispatched before that, never after
 * - a loop whose connection closes or fails returns to Idle on its own
 *
 * Calling `stop(true)` from inside one of the loop's own callbacks never
 * returns: the callback would wait for itself.
 */

import { Data, Deferred, Effect, Fiber, Ref, Scope, pipe } from 'effect';
import type { ReadonlyDeep } from 'type-fest';
import {
  isolateHandler,
  type Connection,
  type ConnectionError,
  type ConnectionIOError,
} from '@framewire/transport';
import {
  ReceiveLoopDisposed,
  type FrameTooLarge,
  type MalformedPayload,
  type UnknownType,
} from './errors';
import type { Frame } from './frame';
import { receiveFrame } from './frame-receiver';
import type { Message, SerializationRegistryService } from './serialization-registry';

// =============================================================================
// Public Types
// =============================================================================

export type ReceiveLoopState = 'Idle' | 'Starting' | 'Running' | 'Stopping';

/**
 * Errors reported through `onSocketException`. Per-frame errors drop the frame;
 * the others end the loop.
 */
export type ReceiveLoopError = UnknownType | MalformedPayload | ConnectionIOError | FrameTooLarge;

export type MessageReceivedHandler = (
  connection: Connection,
  message: ReadonlyDeep<Message>
) => Effect.Effect<void, unknown>;

export type SocketExceptionHandler = (
  connection: Connection,
  error: ReceiveLoopError
) => Effect.Effect<void, unknown>;

export interface ReceiveLoopOptions {
  readonly connection: Connection;
  readonly registry: SerializationRegistryService;
  readonly onMessageReceived: MessageReceivedHandler;
  readonly onSocketException?: SocketExceptionHandler;
}

export interface ReceiveLoop {
  readonly connection: Connection;
  readonly start: Effect.Effect<void, ReceiveLoopDisposed>;
  readonly stop: (waitForExit?: boolean) => Effect.Effect<void>;
  /** Closes the connection and stops the loop without waiting. Safe to call more than once. */
  readonly dispose: Effect.Effect<void>;
  readonly state: Effect.Effect<ReceiveLoopState>;
}

// =============================================================================
// Internal State
// =============================================================================

type LoopState = Data.TaggedEnum<{
  Idle: {};
  Starting: {
    readonly running: Deferred.Deferred<void>;
    readonly idle: Deferred.Deferred<void>;
  };
  Running: {
    readonly fiber: Fiber.RuntimeFiber<void>;
    readonly idle: Deferred.Deferred<void>;
  };
  Stopping: { readonly idle: Deferred.Deferred<void> };
}>;

const { Idle, Starting, Running, Stopping } = Data.taggedEnum<LoopState>();

type StartAction = Data.TaggedEnum<{
  Launch: { readonly running: Deferred.Deferred<void>; readonly idle: Deferred.Deferred<void> };
  AwaitRunning: { readonly running: Deferred.Deferred<void> };
  AwaitIdle: { readonly idle: Deferred.Deferred<void> };
  Done: {};
}>;

const { Launch, AwaitRunning, AwaitIdle, Done, $match: matchStartAction } =
  Data.taggedEnum<StartAction>();

const ownsIdle = (state: LoopState, idle: Deferred.Deferred<void>): boolean =>
  state._tag !== 'Idle' && state.idle === idle;

// =============================================================================
// Loop Body
// =============================================================================

const isFatal = (error: ConnectionError | FrameTooLarge): error is ConnectionIOError | FrameTooLarge =>
  error._tag !== 'ConnectionClosed';

/**
 * Handles one received frame. Returns whether the loop continues.
 */
const dispatchFrame = (
  options: ReceiveLoopOptions,
  report: (error: ReceiveLoopError) => Effect.Effect<void>,
  frame: Frame
): Effect.Effect<boolean> =>
  pipe(
    options.registry.deserialize(frame.typeId, frame.payload),
    Effect.matchEffect({
      onFailure: (error) =>
        pipe(
          Effect.logDebug(`Dropped frame of type ${frame.typeId}: ${error.message}`),
          Effect.zipRight(report(error))
        ),
      onSuccess: (message) =>
        isolateHandler('onMessageReceived', () =>
          options.onMessageReceived(options.connection, message)
        ),
    }),
    Effect.as(true)
  );

const receiveStep = (
  options: ReceiveLoopOptions,
  report: (error: ReceiveLoopError) => Effect.Effect<void>
): Effect.Effect<boolean> =>
  Effect.uninterruptibleMask((restore) =>
    pipe(
      restore(receiveFrame(options.connection)),
      Effect.matchEffect({
        onFailure: (error) =>
          isFatal(error)
            ? pipe(
                Effect.logWarning(`Receive loop ending: ${error.message}`),
                Effect.zipRight(report(error)),
                Effect.as(false)
              )
            : Effect.as(Effect.logDebug('Connection closed, receive loop ending'), false),
        onSuccess: (frame) => dispatchFrame(options, report, frame),
      })
    )
  );

const runLoop = (options: ReceiveLoopOptions): Effect.Effect<void> => {
  const onSocketException = options.onSocketException;
  const report = (error: ReceiveLoopError): Effect.Effect<void> =>
    onSocketException === undefined
      ? Effect.void
      : isolateHandler('onSocketException', () => onSocketException(options.connection, error));

  return pipe(
    Effect.iterate(true, {
      while: (continues) => continues,
      body: () => receiveStep(options, report),
    }),
    Effect.asVoid,
    Effect.onInterrupt(() => Effect.logDebug('Receive loop cancelled'))
  );
};

// =============================================================================
// Constructor
// =============================================================================

export const makeReceiveLoop = (options: ReceiveLoopOptions): Effect.Effect<ReceiveLoop> =>
  Effect.gen(function* () {
    const stateRef = yield* Ref.make<LoopState>(Idle());
    const disposed = yield* Ref.make(false);
    const connection = options.connection;

    const annotate = Effect.annotateLogs({
      component: 'receive-loop',
      connectionId: connection.id,
    });

    // the fiber leaves its own state behind, whichever way it ends
    const settle = (idle: Deferred.Deferred<void>) =>
      pipe(
        Ref.update(stateRef, (state) => (ownsIdle(state, idle) ? Idle() : state)),
        Effect.zipRight(Deferred.succeed(idle, undefined))
      );

    const launch = (
      running: Deferred.Deferred<void>,
      idle: Deferred.Deferred<void>
    ): Effect.Effect<void> =>
      pipe(
        Deferred.succeed(running, undefined),
        Effect.zipRight(runLoop(options)),
        Effect.ensuring(settle(idle)),
        annotate,
        Effect.interruptible,
        Effect.forkDaemon,
        Effect.flatMap((fiber) =>
          Ref.update(stateRef, (state) =>
            state._tag === 'Starting' && state.idle === idle ? Running({ fiber, idle }) : state
          )
        ),
        Effect.zipRight(Effect.logDebug('Receive loop started')),
        annotate
      );

    const decideStart =
      (running: Deferred.Deferred<void>, idle: Deferred.Deferred<void>) =>
      (state: LoopState): readonly [StartAction, LoopState] => {
        switch (state._tag) {
          case 'Idle':
            return [Launch({ running, idle }), Starting({ running, idle })];
          case 'Starting':
            return [AwaitRunning({ running: state.running }), state];
          case 'Running':
            return [Done(), state];
          case 'Stopping':
            return [AwaitIdle({ idle: state.idle }), state];
        }
      };

    const start: Effect.Effect<void, ReceiveLoopDisposed> = Effect.uninterruptibleMask(
      (restore) =>
        Effect.gen(function* () {
          if (yield* Ref.get(disposed)) {
            return yield* Effect.fail(
              new ReceiveLoopDisposed({
                message: 'Receive loop has been disposed',
                connectionId: connection.id,
              })
            );
          }
          const running = yield* Deferred.make<void>();
          const idle = yield* Deferred.make<void>();
          const action = yield* Ref.modify(stateRef, decideStart(running, idle));

          yield* matchStartAction(action, {
            Launch: (launchAction) =>
              pipe(
                launch(launchAction.running, launchAction.idle),
                Effect.zipRight(restore(Deferred.await(launchAction.running)))
              ),
            AwaitRunning: (waitAction) => restore(Deferred.await(waitAction.running)),
            AwaitIdle: (waitAction) =>
              pipe(
                restore(Deferred.await(waitAction.idle)),
                Effect.zipRight(Effect.suspend(() => start))
              ),
            Done: () => Effect.void,
          });
        })
    );

    const stop = (waitForExit = true): Effect.Effect<void> =>
      Effect.uninterruptibleMask((restore) =>
        pipe(
          Ref.get(stateRef),
          Effect.flatMap((current): Effect.Effect<void> => {
            switch (current._tag) {
              case 'Idle':
                return Effect.void;
              case 'Starting':
                return pipe(
                  restore(Deferred.await(current.running)),
                  Effect.zipRight(Effect.suspend(() => stop(waitForExit)))
                );
              case 'Stopping':
                return waitForExit ? restore(Deferred.await(current.idle)) : Effect.void;
              case 'Running':
                return pipe(
                  Ref.modify(stateRef, (state): readonly [boolean, LoopState] =>
                    state === current ? [true, Stopping({ idle: current.idle })] : [false, state]
                  ),
                  Effect.flatMap((stopping) =>
                    stopping
                      ? pipe(
                          Effect.logDebug('Stopping receive loop'),
                          annotate,
                          Effect.zipRight(Fiber.interruptFork(current.fiber)),
                          Effect.zipRight(
                            waitForExit ? restore(Deferred.await(current.idle)) : Effect.void
                          )
                        )
                      : Effect.suspend(() => stop(waitForExit))
                  )
                );
            }
          })
        )
      );

    const dispose: Effect.Effect<void> = pipe(
      Ref.getAndSet(disposed, true),
      Effect.flatMap((alreadyDisposed) =>
        alreadyDisposed
          ? Effect.void
          : pipe(connection.close, Effect.zipRight(stop(false)))
      ),
      Effect.uninterruptible
    );

    const state = Effect.map(Ref.get(stateRef), (current): ReceiveLoopState => current._tag);

    return { connection, start, stop, dispose, state };
  });

/**
 * A started receive loop, disposed when the scope closes.
 */
export const receiveLoopScoped = (
  options: ReceiveLoopOptions
): Effect.Effect<ReceiveLoop, ReceiveLoopDisposed, Scope.Scope> =>
  Effect.acquireRelease(
    pipe(
      makeReceiveLoop(options),
      Effect.tap((loop) => loop.start)
    ),
    (loop) => loop.dispose
  );
