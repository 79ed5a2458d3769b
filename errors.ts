import type { TableSource } from './types';

export type MergeErrorKind = 'parse' | 'missing-column' | 'serialization';

/**
 * Base class for every failure the merge engine reports back to the UI.
 * `message` is shown to the user as-is.
 */
export abstract class MergeEngineError extends Error {
  abstract readonly kind: MergeErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ParseError extends MergeEngineError {
  readonly kind = 'parse';

  constructor(readonly source: TableSource, reason: string, options?: { cause?: unknown }) {
    super(`Could not read ${source}: ${reason}`, options);
  }
}

export class MissingColumnError extends MergeEngineError {
  readonly kind = 'missing-column';

  constructor(readonly column: string, readonly source: TableSource) {
    super(`Column '${column}' not found in ${source}`);
  }
}

export class SerializationError extends MergeEngineError {
  readonly kind = 'serialization';

  constructor(reason: string, options?: { cause?: unknown }) {
    super(`Could not write the merged workbook: ${reason}`, options);
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown error';
