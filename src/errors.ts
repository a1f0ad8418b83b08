export abstract class KilnError extends Error {
  readonly exitCode: number;

  constructor(public readonly code: string, message: string, exitCode = 1) {
    super(message);
    this.name = this.constructor.name;
    this.exitCode = exitCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export class ParseError extends KilnError {
  constructor(message: string) {
    super('PARSE_ERROR', message, 2);
  }
}

export class UnknownCommandError extends KilnError {
  constructor(public readonly command: string, message = `Unknown command '${command}'`) {
    super('UNKNOWN_COMMAND', message, 2);
  }
}

export class InvalidNameError extends KilnError {
  constructor(public readonly value: string, reason: string) {
    super('INVALID_NAME', `Invalid name '${value}': ${reason}`);
  }
}

export class TargetExistsError extends KilnError {
  constructor(public readonly target: string) {
    super('TARGET_EXISTS', `File '${target}' already exists. Use --force to overwrite.`);
  }
}

export class DestinationNotEmptyError extends KilnError {
  constructor(public readonly destination: string) {
    super('DESTINATION_NOT_EMPTY', `Destination '${destination}' already exists and is not empty`);
  }
}

export class KeyNotFoundError extends KilnError {
  constructor(public readonly key: string) {
    super('KEY_NOT_FOUND', `Configuration key '${key}' not found`);
  }
}

export class TypeConflictError extends KilnError {
  constructor(public readonly key: string, public readonly conflictAt: string) {
    super(
      'TYPE_CONFLICT',
      `Cannot set '${key}': '${conflictAt}' holds a value that is not a mapping`
    );
  }
}

export class DelegatedFailure extends KilnError {
  constructor(public readonly command: string, message: string, exitCode = 1) {
    super('DELEGATED_FAILURE', message, exitCode > 0 ? exitCode : 1);
  }
}

export class NotAProjectError extends KilnError {
  constructor(directory: string) {
    super(
      'NOT_A_PROJECT',
      `No kiln.yaml found in '${directory}' or any parent directory. Run this command inside a Kiln project.`
    );
  }
}

export class UnknownTemplateError extends KilnError {
  constructor(public readonly template: string, available: readonly string[]) {
    super(
      'UNKNOWN_TEMPLATE',
      `Unknown template '${template}'. Available templates: ${available.join(', ')}`
    );
  }
}

export class ConfigFormatError extends KilnError {
  constructor(file: string, detail: string) {
    super('CONFIG_FORMAT', `Invalid file '${file}': ${detail}`);
  }
}

export class ConfigValidationError extends KilnError {
  constructor(count: number) {
    super('CONFIG_INVALID', `Configuration validation failed with ${count} error(s)`);
  }
}

export class OperationRefusedError extends KilnError {
  constructor(message: string) {
    super('OPERATION_REFUSED', message);
  }
}

export function exitCodeFor(error: unknown): number {
  return error instanceof KilnError ? error.exitCode : 1;
}
