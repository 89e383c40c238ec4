/** Fatal problem with the input dataset or embedding table. */
export class InputError extends Error {
  readonly source?: string;
  readonly field?: string;

  constructor(message: string, opts: { source?: string; field?: string } = {}) {
    super(message);
    this.name = 'InputError';
    this.source = opts.source;
    this.field = opts.field;
  }
}

/** A vector that cannot be scored (length mismatch, non-finite component). */
export class VectorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'VectorError';
  }
}
