export type HighlightErrorCode = "INVALID_CONFIGURATION" | "INSUFFICIENT_SIGNAL" | "INVALID_INPUT";

export class HighlightError extends Error {
  code: HighlightErrorCode;
  userMessage: string;
  constructor(code: HighlightErrorCode, message: string, userMessage: string) {
    super(message);
    this.name = "HighlightError";
    this.code = code;
    this.userMessage = userMessage;
  }
}

export class InvalidConfigurationError extends HighlightError {
  issues: string[];
  constructor(issues: string[]) {
    super(
      "INVALID_CONFIGURATION",
      `Invalid highlight configuration: ${issues.join("; ")}`,
      "The clip settings are invalid. Check clip count and duration limits."
    );
    this.name = "InvalidConfigurationError";
    this.issues = issues;
  }
}

export class InsufficientSignalError extends HighlightError {
  reason: string;
  constructor(reason: string) {
    super("INSUFFICIENT_SIGNAL", `Insufficient signal: ${reason}`, "Not enough audio or text to analyze this video.");
    this.name = "InsufficientSignalError";
    this.reason = reason;
  }
}

export class InvalidInputError extends HighlightError {
  issues: string[];
  constructor(issues: string[]) {
    super(
      "INVALID_INPUT",
      `Invalid analysis input: ${issues.join("; ")}`,
      "The video analysis data is incomplete or corrupted."
    );
    this.name = "InvalidInputError";
    this.issues = issues;
  }
}

export function isHighlightError(error: unknown): error is HighlightError {
  return error instanceof HighlightError;
}
