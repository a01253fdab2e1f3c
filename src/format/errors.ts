/**
 * Error taxonomy for the formatting engine.
 *
 * Template defects (unbalanced delimiters, a missing positional argument)
 * always propagate. Data problems derive from RecoverableFormatError: the
 * safe formatter turns them into placeholders and the section composer
 * drops the section that raised them.
 */

export class FormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FormatError";
  }
}

/** Unbalanced `{`/`}` or another malformed template construct. */
export class TemplateSyntaxError extends FormatError {
  constructor(
    message: string,
    public readonly position?: number
  ) {
    super(position === undefined ? message : `${message} (at ${position})`);
    this.name = "TemplateSyntaxError";
  }
}

/** A numeric field refers past the end of the positional arguments. */
export class MissingPositionalArgumentError extends FormatError {
  constructor(public readonly index: number) {
    super(`Missing positional argument ${index}`);
    this.name = "MissingPositionalArgumentError";
  }
}

// ---------------------------------------------------------------------------
// Recoverable
// ---------------------------------------------------------------------------

export class RecoverableFormatError extends FormatError {
  constructor(message: string) {
    super(message);
    this.name = "RecoverableFormatError";
  }
}

/** Direct lookup and evaluation both failed (strict mode only). */
export class UnresolvedFieldError extends RecoverableFormatError {
  constructor(public readonly fieldExpr: string) {
    super(`Unresolved field: {${fieldExpr}}`);
    this.name = "UnresolvedFieldError";
  }
}

/** One step of an attribute/index chain did not exist. */
export class LookupFailedError extends RecoverableFormatError {
  constructor(
    public readonly fieldExpr: string,
    public readonly key: string | number
  ) {
    super(`Cannot resolve ${JSON.stringify(String(key))} in field {${fieldExpr}}`);
    this.name = "LookupFailedError";
  }
}

/** The value resolved but is empty while empty values are rejected. */
export class EmptyValueError extends RecoverableFormatError {
  constructor(public readonly fieldExpr: string) {
    super(`Field {${fieldExpr}} is empty`);
    this.name = "EmptyValueError";
  }
}

export class FormatSpecError extends RecoverableFormatError {
  constructor(
    public readonly spec: string,
    reason: string
  ) {
    super(`Invalid format specifier ${JSON.stringify(spec)}: ${reason}`);
    this.name = "FormatSpecError";
  }
}

export class ConversionError extends RecoverableFormatError {
  constructor(public readonly conversion: string) {
    super(`Unknown conversion specifier ${JSON.stringify(conversion)}`);
    this.name = "ConversionError";
  }
}

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

/**
 * Thrown by an Evaluator when the expression cannot be evaluated against
 * the given names. The formatter treats it as an unresolved field.
 */
export class InvalidExpressionError extends Error {
  constructor(
    public readonly expression: string,
    message?: string
  ) {
    super(message ?? `Invalid expression: ${expression}`);
    this.name = "InvalidExpressionError";
  }
}

/** Color substitution was handed something other than a string. */
export class StyleApplicationError extends FormatError {
  constructor(public readonly receivedType: string) {
    super(`Incorrect label/title type ${receivedType}`);
    this.name = "StyleApplicationError";
  }
}

export function isRecoverable(err: unknown): err is RecoverableFormatError {
  return err instanceof RecoverableFormatError;
}
