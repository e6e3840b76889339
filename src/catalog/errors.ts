export type CatalogErrorKind = 'not_found' | 'transport';

export class CatalogError extends Error {
  readonly kind: CatalogErrorKind;
  constructor(kind: CatalogErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.kind = kind;
    this.name = 'CatalogError';
  }
}

/**
 * A lookup matched nothing. Answered with a polite "couldn't find that" reply.
 */
export class CatalogNotFoundError extends CatalogError {
  readonly query: string;
  constructor(query: string) {
    super('not_found', `No catalog match for "${query}"`);
    this.name = 'CatalogNotFoundError';
    this.query = query;
  }
}

/**
 * Network failure, timeout, bad status or unreadable payload from the catalog.
 */
export class CatalogTransportError extends CatalogError {
  readonly status?: number;
  readonly retryable: boolean;
  constructor(message: string, opts: { status?: number; retryable?: boolean; cause?: unknown } = {}) {
    super('transport', message, { cause: opts.cause });
    this.name = 'CatalogTransportError';
    this.status = opts.status;
    this.retryable = opts.retryable ?? false;
  }
}
