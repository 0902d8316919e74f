/**
 * Endpoints
 *
 * An endpoint is an immutable address: the transport kind plus the fields that
 * transport needs. Values built by the constructors below compare and hash
 * structurally, so they can key a HashMap directly.
 *
 * External forms:
 * - `tcp://host:port` (IPv6 hosts in brackets, port 0 asks the OS for one)
 * - `inproc://name`
 */

import { Data, Effect, ParseResult, Schema, pipe } from 'effect';
import { InvalidEndpoint, InvalidTransport } from './errors';

// ============================================================================
// Endpoint Type
// ============================================================================

export type Endpoint = Data.TaggedEnum<{
  readonly Tcp: { readonly host: string; readonly port: number };
  readonly Inproc: { readonly name: string };
}>;

export type TransportKind = Endpoint['_tag'];

export type TcpEndpoint = Data.TaggedEnum.Value<Endpoint, 'Tcp'>;
export type InprocEndpoint = Data.TaggedEnum.Value<Endpoint, 'Inproc'>;

const { Tcp, Inproc, $is, $match } = Data.taggedEnum<Endpoint>();

export const tcp = (host: string, port: number): TcpEndpoint => Tcp({ host, port });

export const inproc = (name: string): InprocEndpoint => Inproc({ name });

export const isTcp = $is('Tcp');
export const isInproc = $is('Inproc');

// ============================================================================
// Validation
// ============================================================================

const Port = pipe(Schema.Int, Schema.between(0, 65535));

const TcpFields = Schema.Struct({
  host: Schema.NonEmptyTrimmedString,
  port: Port,
});

const InprocFields = Schema.Struct({
  name: Schema.NonEmptyTrimmedString,
});

const TcpUriFields = Schema.Struct({
  host: Schema.NonEmptyTrimmedString,
  port: Schema.compose(Schema.NumberFromString, Port),
});

const invalidEndpoint = (input: string, cause?: unknown) =>
  new InvalidEndpoint({
    message: `Invalid endpoint: ${input}`,
    input,
    ...(cause !== undefined && { cause }),
  });

export const format: (endpoint: Endpoint) => string = $match({
  Tcp: ({ host, port }) => `tcp://${host.includes(':') ? `[${host}]` : host}:${port}`,
  Inproc: ({ name }) => `inproc://${name}`,
});

const decodeFields: (endpoint: Endpoint) => Effect.Effect<Endpoint, ParseResult.ParseError> =
  $match({
    Tcp: (value) => pipe(value, Schema.decodeUnknown(TcpFields), Effect.as(value)),
    Inproc: (value) => pipe(value, Schema.decodeUnknown(InprocFields), Effect.as(value)),
  });

/**
 * Checks that the fields of an endpoint are well-formed for its transport kind.
 */
export const validate = (endpoint: Endpoint): Effect.Effect<Endpoint, InvalidEndpoint> =>
  pipe(
    endpoint,
    decodeFields,
    Effect.mapError((error) => invalidEndpoint(format(endpoint), error))
  );

const splitHostAndPort = (address: string): { readonly host: string; readonly port: string } => {
  const bracketed = /^\[([^\]]+)\]:(.*)$/.exec(address);
  if (bracketed) {
    return { host: bracketed[1] ?? '', port: bracketed[2] ?? '' };
  }
  const separator = address.lastIndexOf(':');
  return separator < 0
    ? { host: address, port: '' }
    : { host: address.slice(0, separator), port: address.slice(separator + 1) };
};

const parseTcp = (input: string, address: string): Effect.Effect<Endpoint, InvalidEndpoint> =>
  pipe(
    splitHostAndPort(address),
    Schema.decodeUnknown(TcpUriFields),
    Effect.map(({ host, port }) => tcp(host, port)),
    Effect.mapError((error) => invalidEndpoint(input, error))
  );

const parseInproc = (input: string, name: string): Effect.Effect<Endpoint, InvalidEndpoint> =>
  pipe(
    { name },
    Schema.decodeUnknown(InprocFields),
    Effect.map((fields) => inproc(fields.name)),
    Effect.mapError((error) => invalidEndpoint(input, error))
  );

/**
 * Parses the external form of an endpoint.
 */
export const parse = (input: string): Effect.Effect<Endpoint, InvalidEndpoint> => {
  const match = /^([a-z]+):\/\/(.*)$/i.exec(input.trim());
  const scheme = match?.[1]?.toLowerCase();
  const rest = match?.[2] ?? '';

  if (scheme === 'tcp') return parseTcp(input, rest);
  if (scheme === 'inproc') return parseInproc(input, rest);
  return Effect.fail(invalidEndpoint(input));
};

// ============================================================================
// Transport Kind Guards
// ============================================================================

const wrongTransport = (expected: TransportKind, endpoint: Endpoint) =>
  new InvalidTransport({
    message: `Expected a ${expected} endpoint, got ${format(endpoint)}`,
    expected,
    actual: endpoint._tag,
  });

export const requireTcp = (endpoint: Endpoint): Effect.Effect<TcpEndpoint, InvalidTransport> =>
  isTcp(endpoint) ? Effect.succeed(endpoint) : Effect.fail(wrongTransport('Tcp', endpoint));

export const requireInproc = (
  endpoint: Endpoint
): Effect.Effect<InprocEndpoint, InvalidTransport> =>
  isInproc(endpoint) ? Effect.succeed(endpoint) : Effect.fail(wrongTransport('Inproc', endpoint));
