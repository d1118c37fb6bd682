/**
 * Error taxonomy for the relay. Every error carries a stable `code` and the
 * HTTP `status` the REST layer answers with when one escapes a route.
 */
export abstract class RelayError extends Error {
  abstract readonly code: string;
  readonly status: number = 500;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export type SchemaErrorKind =
  | 'invalid_document'
  | 'invalid_id'
  | 'duplicate_id'
  | 'invalid_range'
  | 'invalid_rule'
  | 'invalid_layout';

/** A schema load failed; the previously active schema stays in effect. */
export class SchemaError extends RelayError {
  readonly code = 'schema_error';
  override readonly status = 422;

  constructor(
    readonly kind: SchemaErrorKind,
    readonly sensorId: string | null,
    readonly detail: string,
  ) {
    super(sensorId ? `${kind} (${sensorId}): ${detail}` : `${kind}: ${detail}`);
  }
}

export type DecodeErrorKind = 'integrity' | 'field_out_of_range';

export class DecodeError extends RelayError {
  readonly code = 'decode_error';
  override readonly status = 400;

  constructor(
    readonly kind: DecodeErrorKind,
    readonly detail: string,
  ) {
    super(`${kind}: ${detail}`);
  }
}

/** A value cannot be represented in its declared field width. */
export class EncodeError extends RelayError {
  readonly code = 'encode_error';
  override readonly status = 400;

  constructor(
    readonly sensorId: string,
    readonly value: number,
    readonly detail: string,
  ) {
    super(`${sensorId}=${value}: ${detail}`);
  }
}

export type LinkErrorKind = 'refused' | 'dropped' | 'timeout';

export class LinkError extends RelayError {
  readonly code = 'link_error';
  override readonly status = 503;

  constructor(
    readonly kind: LinkErrorKind,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(`${kind}: ${detail}`);
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

export class SubscriberClosedError extends RelayError {
  readonly code = 'subscriber_closed';
  override readonly status = 410;

  constructor(readonly subscriberId: string) {
    super(`subscriber ${subscriberId} is closed`);
  }
}
