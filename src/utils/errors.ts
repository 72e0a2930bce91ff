/**
 * Error taxonomy. Cell-level errors are recorded and the run continues;
 * TableIOError and ConfigError abort the run.
 */

export class CellwiseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnsupportedLanguageError extends CellwiseError {
  constructor(
    public readonly language: string,
    public readonly target: string,
    public readonly engine?: string
  ) {
    super(
      engine
        ? `${engine} does not support ${language} -> ${target}`
        : `No engine supports ${language} -> ${target}`
    );
  }
}

/**
 * A model call failed. `resource` marks failures caused by memory or load
 * pressure, which are retried once at half the batch size.
 */
export class BackendInferenceError extends CellwiseError {
  readonly resource: boolean;

  constructor(
    message: string,
    options: { resource?: boolean; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.resource = options.resource ?? false;
  }
}

/**
 * Cell text with a replacement character or an unpaired surrogate
 */
export class MalformedCellError extends CellwiseError {
  constructor() {
    super("Cell text is not valid Unicode");
  }
}

export class TableIOError extends CellwiseError {}

export class ConfigError extends CellwiseError {}

export class ColumnNotFoundError extends ConfigError {
  constructor(public readonly columns: string[]) {
    super(`Column(s) not found in table: ${columns.join(", ")}`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
