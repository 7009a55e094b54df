/**
 * Error types raised while turning kamut documents into manifests.
 *
 * `MissingRequiredFieldError` and `UnsupportedKindError` are recovered per
 * document; every other error aborts the file it was raised for.
 */

export interface DocumentSource {
  file: string;
  index: number;
}

export class KamutError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'KamutError';
  }
}

export class FileIOError extends KamutError {
  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown,
  ) {
    super(message, 'FILE_IO_ERROR', { path, cause });
    this.name = 'FileIOError';
  }
}

export class ParseError extends KamutError {
  constructor(
    message: string,
    public readonly source: DocumentSource,
    public readonly issues: string[] = [],
  ) {
    super(message, 'PARSE_ERROR', { ...source, issues });
    this.name = 'ParseError';
  }
}

export class MissingKindError extends KamutError {
  constructor(public readonly source: DocumentSource) {
    super(
      `'kind' field is required in document ${source.index} of ${source.file}`,
      'MISSING_KIND',
      { ...source },
    );
    this.name = 'MissingKindError';
  }
}

export class MissingRequiredFieldError extends KamutError {
  constructor(
    public readonly kind: string,
    public readonly field: string,
    public readonly resourceName: string,
  ) {
    super(
      `${kind} "${resourceName}" requires '${field}' to be specified`,
      'MISSING_REQUIRED_FIELD',
      { kind, field, resourceName },
    );
    this.name = 'MissingRequiredFieldError';
  }
}

export class UnsupportedKindError extends KamutError {
  constructor(
    public readonly kind: string,
    public readonly resourceName: string,
  ) {
    super(`Unsupported kind "${kind}" for "${resourceName}"`, 'UNSUPPORTED_KIND', {
      kind,
      resourceName,
    });
    this.name = 'UnsupportedKindError';
  }
}

export class SerializationError extends KamutError {
  constructor(
    message: string,
    public readonly manifestKind: string,
    cause?: unknown,
  ) {
    super(message, 'SERIALIZATION_ERROR', { manifestKind, cause });
    this.name = 'SerializationError';
  }
}

/**
 * Errors that skip a single document instead of failing the file.
 */
export function isRecoverable(
  err: unknown,
): err is MissingRequiredFieldError | UnsupportedKindError {
  return err instanceof MissingRequiredFieldError || err instanceof UnsupportedKindError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
