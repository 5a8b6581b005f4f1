import { CommandError } from "./exec";

export type CliErrorKind = "validation" | "configuration" | "parse" | "dependency" | "runtime";

interface CliErrorOptions {
  kind: CliErrorKind;
  message: string;
  hint?: string;
  detail?: string;
  exitCode?: number;
}

export class CliError extends Error {
  readonly kind: CliErrorKind;
  readonly hint?: string;
  readonly detail?: string;
  readonly exitCode: number;

  constructor(options: CliErrorOptions) {
    super(options.message);
    this.name = "CliError";
    this.kind = options.kind;
    this.hint = options.hint;
    this.detail = options.detail;
    this.exitCode = options.exitCode ?? 1;
  }
}

/**
 * Tool output did not have the shape the parsers expect. `input` holds the
 * offending text (a volume record, a status blob) for diagnosis.
 */
export class ParseError extends Error {
  readonly input?: string;

  constructor(message: string, input?: string) {
    super(message);
    this.name = "ParseError";
    this.input = input;
  }
}

export class ConfigurationError extends Error {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(message);
    this.name = "ConfigurationError";
    this.details = details;
  }
}

export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) {
    return error;
  }

  if (error instanceof ParseError) {
    return new CliError({
      kind: "parse",
      message: `Unexpected AFS tool output: ${error.message}`,
      detail: error.input?.trim() || undefined
    });
  }

  if (error instanceof ConfigurationError) {
    return new CliError({
      kind: "configuration",
      message: error.message,
      detail: error.details.length > 0 ? error.details.join("\n") : undefined
    });
  }

  if (error instanceof CommandError) {
    return new CliError({
      kind: "runtime",
      message: error.message,
      detail: error.output || undefined
    });
  }

  if (isMissingBinaryError(error)) {
    return new CliError({
      kind: "dependency",
      message: error.message,
      hint: "Install the OpenAFS client tools (bos, vos, rxdebug) and make sure they are on PATH."
    });
  }

  if (error instanceof Error) {
    return new CliError({
      kind: "runtime",
      message: error.message
    });
  }

  return new CliError({
    kind: "runtime",
    message: String(error)
  });
}

export function renderCliError(error: CliError): string {
  const lines = [error.message];
  if (error.hint) {
    lines.push(`Hint: ${error.hint}`);
  }
  if (error.detail) {
    lines.push(error.detail);
  }
  return lines.join("\n");
}

function isMissingBinaryError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
