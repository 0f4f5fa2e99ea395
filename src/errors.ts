/**
 * Error taxonomy for the setup pipeline
 */

export const SetupErrorCodes = {
  UNSUPPORTED_PLATFORM: "UNSUPPORTED_PLATFORM",
  MISSING_PREREQUISITE: "MISSING_PREREQUISITE",
  PACKAGE_INSTALL_FAILED: "PACKAGE_INSTALL_FAILED",
  DESTINATION_CONFLICT: "DESTINATION_CONFLICT",
  CLONE_FAILED: "CLONE_FAILED",
  INVALID_CONFIG: "INVALID_CONFIG",
} as const;

export type SetupErrorCode = typeof SetupErrorCodes[keyof typeof SetupErrorCodes];

export class SetupError extends Error {
  constructor(
    public code: SetupErrorCode,
    message: string,
    public hints: string[] = [],
    /** Raw tool output shown indented under the message. */
    public context?: string
  ) {
    super(message);
    this.name = "SetupError";
    Object.setPrototypeOf(this, SetupError.prototype);
  }
}

export function createError(
  code: SetupErrorCode,
  message: string,
  hints: string[] = [],
  context?: string
): SetupError {
  return new SetupError(code, message, hints, context);
}

/**
 * Wrap anything thrown inside a step so the pipeline only ever sees SetupError.
 */
export function toSetupError(err: unknown, code: SetupErrorCode): SetupError {
  if (err instanceof SetupError) {
    return err;
  }
  return new SetupError(code, formatErrorMessage(err));
}

export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
