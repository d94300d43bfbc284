/**
 * Service error model. Routes map these to HTTP status codes.
 */

export type ErrorMetadata = Record<string, unknown>;

/** Base for all service errors. Preserves prototype chain for instanceof. */
export class ServiceError extends Error {
  readonly metadata: ErrorMetadata | undefined;

  constructor(message: string, options?: { cause?: unknown; metadata?: ErrorMetadata }) {
    super(message, { cause: options?.cause });
    this.name = this.constructor.name;
    this.metadata = options?.metadata;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Outbound HTTP call failed: network, non-2xx status, or unexpected body. */
export class RemoteFetchError extends ServiceError {
  readonly status: number | undefined;

  constructor(
    message: string,
    options?: { cause?: unknown; status?: number; metadata?: ErrorMetadata },
  ) {
    super(message, options);
    this.status = options?.status;
  }
}

export type UpstreamSource = 'product' | 'remote';

/** One branch of a combined lookup failed; no partial result is produced. */
export class UpstreamError extends ServiceError {
  readonly source: UpstreamSource;

  constructor(source: UpstreamSource, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`${source} lookup failed: ${detail}`, { cause, metadata: { source } });
    this.source = source;
  }
}
