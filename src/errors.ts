export const EXIT_CODE_USAGE = 1;
export const EXIT_CODE_TRANSPORTS_EXHAUSTED = 2;
export const EXIT_CODE_UNSUPPORTED_DIRECTION = 3;

export type Direction = "copy" | "paste";

/**
 * Thrown for bad flags or environment values. Printed without a stack trace.
 */
export class UserInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UserInputError";
  }
}

/**
 * Base class of every error that ends a run with a specific exit code.
 */
export class TermclipError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number,
  ) {
    super(message);
    this.name = "TermclipError";
  }
}

export type TransportErrorKind =
  | "NoCommandFound"
  | "CommandTimeout"
  | "CommandFailed"
  | "PayloadTooLarge"
  | "TerminalUnavailable";

/**
 * Why a single transport attempt failed. These are recovered by the selector, which moves on to the
 * next candidate.
 */
export abstract class TransportError extends Error {
  public abstract readonly kind: TransportErrorKind;
}

export class NoCommandFoundError extends TransportError {
  public readonly kind = "NoCommandFound";
  constructor(public readonly command: string) {
    super(`${command} was not found on PATH`);
    this.name = "NoCommandFoundError";
  }
}

export class CommandTimeoutError extends TransportError {
  public readonly kind = "CommandTimeout";
  constructor(
    public readonly command: string,
    public readonly timeoutMs: number,
  ) {
    super(`${command} did not finish within ${timeoutMs}ms`);
    this.name = "CommandTimeoutError";
  }
}

export class CommandFailedError extends TransportError {
  public readonly kind = "CommandFailed";
  constructor(
    public readonly command: string,
    public readonly exitCode: number | null,
    public readonly signal: NodeJS.Signals | null,
    public readonly stderr: string,
  ) {
    const status = signal !== null ? `was killed by ${signal}` : `exited with code ${exitCode}`;
    super(stderr.length > 0 ? `${command} ${status}: ${stderr}` : `${command} ${status}`);
    this.name = "CommandFailedError";
  }
}

export class PayloadTooLargeError extends TransportError {
  public readonly kind = "PayloadTooLarge";
  constructor(
    public readonly encodedSize: number,
    public readonly maxEncodedSize: number,
  ) {
    super(
      `encoded payload is ${encodedSize} characters, above the OSC 52 limit of ${maxEncodedSize} ` +
        "(raise it with TERMCLIP_OSC52_MAX_B64)",
    );
    this.name = "PayloadTooLargeError";
  }
}

export class TerminalUnavailableError extends TransportError {
  public readonly kind = "TerminalUnavailable";
  constructor(public readonly reason: string) {
    super(`no terminal to write the escape sequence to: ${reason}`);
    this.name = "TerminalUnavailableError";
  }
}

export interface FailedAttempt {
  transport: string;
  error: TransportError;
}

export class AllTransportsExhaustedError extends TermclipError {
  constructor(
    public readonly direction: Direction,
    public readonly attempts: ReadonlyArray<FailedAttempt>,
  ) {
    super(describeExhaustion(direction, attempts), EXIT_CODE_TRANSPORTS_EXHAUSTED);
    this.name = "AllTransportsExhaustedError";
  }
}

export class UnsupportedDirectionError extends TermclipError {
  constructor(public readonly direction: Direction) {
    super(
      direction === "paste"
        ? "paste is not supported here: no native clipboard command can read the clipboard. " +
            "Over SSH, run --paste on your local machine."
        : `${direction} is not supported here.`,
      EXIT_CODE_UNSUPPORTED_DIRECTION,
    );
    this.name = "UnsupportedDirectionError";
  }
}

function describeExhaustion(direction: Direction, attempts: ReadonlyArray<FailedAttempt>): string {
  if (attempts.length === 0) {
    return `no clipboard transport is available to ${direction} with the current overrides.`;
  }
  const names = attempts.map(attempt => attempt.transport).join(", ");
  const details = attempts.map(attempt => `  ${attempt.transport}: ${attempt.error.message}`);
  return [`every clipboard transport failed to ${direction} (tried ${names}):`, ...details].join(
    "\n",
  );
}
