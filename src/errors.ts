export type ErrorContext = Record<string, unknown>;

/**
 * Base class of every error raised while building or reading environments.
 *
 * `context` carries whatever identifies the failure (source, row index, offending value,
 * parameter name) so a failure can be acted on without re-running with more logging.
 */
export class EnvironmentError extends Error {
  constructor(message: string, public readonly context: ErrorContext = {}, public cause?: Error) {
    super(message);
    this.name = new.target.name;
    if (cause) {
      this.cause = cause;
    }
  }
}

/** A file, url or remote dataset could not be read. */
export class SourceUnavailableError extends EnvironmentError {}

export interface MalformedRecordContext extends ErrorContext {
  sourceId: string;
  rowIndex: number;
  value?: unknown;
}

/** A single record could not be parsed. Readers skip these unless running in strict mode. */
export class MalformedRecordError extends EnvironmentError {
  constructor(message: string, public readonly context: MalformedRecordContext, cause?: Error) {
    super(`${message} (source: ${context.sourceId}, row: ${context.rowIndex})`, context, cause);
  }
}

/**
 * Raised at construction time. A lazily read source can only check its data against its
 * options on first read, so it raises this before yielding its first interaction.
 */
export class InvalidConfigurationError extends EnvironmentError {}

/** An interaction built while an environment is being read is inconsistent. */
export class InvalidInteractionError extends EnvironmentError {}

/** Reported (not thrown) when a user supplied generator gives different output for the same seed. */
export class NonDeterministicInputError extends EnvironmentError {}
