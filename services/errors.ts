
export class WorksheetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigError extends WorksheetError {}

export class MissingColumnError extends WorksheetError {
  readonly column: string;

  constructor(column: string) {
    super(`Missing required column "${column}" in score table`);
    this.column = column;
  }
}

export class InvalidValueError extends WorksheetError {}

export class GenerationError extends WorksheetError {}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
