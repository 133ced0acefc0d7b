export type ErrorCode =
  | "CONFIGURATION"
  | "MISSING_DEPENDENCY"
  | "MISSING_OPTIONAL_DEPENDENCY"
  | "PER_FILE";

export class ConverterError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Bad flags or paths. Fatal, raised before any task is dispatched. */
export class ConfigurationError extends ConverterError {
  constructor(message: string, options?: ErrorOptions) {
    super("CONFIGURATION", message, options);
  }
}

export class MissingDependencyError extends ConverterError {
  readonly tool: string;

  constructor(tool: string, message: string, options?: ErrorOptions) {
    super("MISSING_DEPENDENCY", message, options);
    this.tool = tool;
  }
}

/** The image optimizer could not be loaded; images are copied verbatim instead. */
export class MissingOptionalDependencyError extends ConverterError {
  readonly dependency: string;

  constructor(dependency: string, message: string, options?: ErrorOptions) {
    super("MISSING_OPTIONAL_DEPENDENCY", message, options);
    this.dependency = dependency;
  }
}

export class PerFileError extends ConverterError {
  readonly file: string;
  readonly stderr?: string;

  constructor(file: string, message: string, options?: ErrorOptions & { stderr?: string }) {
    super("PER_FILE", message, options);
    this.file = file;
    this.stderr = options?.stderr;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
