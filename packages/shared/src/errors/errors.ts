/**
 * Base error class for nfe-intake
 */
export class IntakeError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'IntakeError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }

    // Maintains proper stack trace for where error was thrown

    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * Malformed XML or an empty document
 */
export class ParseError extends IntakeError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, 'PARSE_ERROR', context, cause);
    this.name = 'ParseError';
  }
}

/**
 * Well-formed document whose structure does not fit the NF-e layout
 */
export class ExtractionError extends IntakeError {
  /** Slash-separated location of the offending node, e.g. `NFe/infNFe/det[2]/prod/vProd` */
  readonly path: string;

  constructor(message: string, path: string, context?: Record<string, unknown>) {
    super(message, 'EXTRACTION_ERROR', { ...context, path });
    this.name = 'ExtractionError';
    this.path = path;
  }
}

/**
 * Store write failure; the transaction was rolled back
 */
export class PersistenceError extends IntakeError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, 'PERSISTENCE_ERROR', context, cause);
    this.name = 'PersistenceError';
  }
}

/**
 * File could not be moved to its terminal area
 */
export class RoutingError extends IntakeError {
  readonly source: string;
  readonly targetDir: string;

  constructor(message: string, source: string, targetDir: string, cause?: unknown) {
    super(message, 'ROUTING_ERROR', { source, targetDir }, cause);
    this.name = 'RoutingError';
    this.source = source;
    this.targetDir = targetDir;
  }
}

/**
 * Error thrown for configuration issues
 */
export class ConfigurationError extends IntakeError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, 'CONFIGURATION_ERROR', context, cause);
    this.name = 'ConfigurationError';
  }
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
