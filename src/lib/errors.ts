import { DISPLAY_EXCERPT_LENGTH } from "./constants";
import { CommandError } from "./exec";

export type CliErrorKind = "validation" | "not_found" | "dependency" | "runtime";

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
 * The remote-execution channel has accepted a command but cannot report on it yet
 * (SSM `InvocationDoesNotExist`, Azure `ResourceNotFound` right after create).
 */
export class InvocationPendingError extends Error {
  readonly commandId: string;

  constructor(commandId: string, message = `Command ${commandId} is not registered yet`) {
    super(message);
    this.name = "InvocationPendingError";
    this.commandId = commandId;
  }
}

export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) {
    return error;
  }

  if (error instanceof CommandError) {
    const detail = [error.stdout, error.stderr].filter(Boolean).join("\n");
    return new CliError({
      kind: "runtime",
      message: error.message,
      detail: detail || undefined
    });
  }

  if (isMissingBinaryError(error)) {
    return new CliError({
      kind: "dependency",
      message: error.message,
      hint: "Run `deskfleet doctor` to see which tools are missing."
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

export function describeError(error: unknown): string {
  if (error instanceof CommandError) {
    return error.stderr || error.stdout || error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

export const REDACTED = "[redacted]";

/** Masks `secret` in `text`, both as written and in its single-quote-doubled script form. */
export function redactSecret(text: string, secret: string): string {
  if (!secret) {
    return text;
  }
  const forms = [...new Set([secret.replace(/'/g, "''"), JSON.stringify(secret).slice(1, -1), secret])]
    .sort((a, b) => b.length - a.length);
  return forms.reduce((masked, form) => masked.split(form).join(REDACTED), text);
}

export function excerpt(text: string, limit = DISPLAY_EXCERPT_LENGTH): string {
  const trimmed = text.trim();
  if (trimmed.length <= limit) {
    return trimmed;
  }
  return `${trimmed.slice(0, limit)}...`;
}

function isMissingBinaryError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && (error as NodeJS.ErrnoException).code === "ENOENT"
    && error.message.startsWith("spawn ");
}
