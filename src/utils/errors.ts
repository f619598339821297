import { MESSAGES } from "./constants";

/**
 * Base class for recoverable errors. `userMessage` is the short status line
 * shown to the user; `message` carries the detail for logs.
 */
export class AllocationError extends Error {
  readonly userMessage: string;

  constructor(userMessage: string, detail?: string) {
    super(detail ?? userMessage);
    this.name = "AllocationError";
    this.userMessage = userMessage;
  }
}

/**
 * The positions file is missing, unreadable, or not shaped like an export.
 */
export class PositionFileError extends AllocationError {
  constructor(detail: string) {
    super(MESSAGES.csvFileError, detail);
    this.name = "PositionFileError";
  }
}

/**
 * The amount to invest is not a number.
 */
export class InvestAmountError extends AllocationError {
  readonly input: string;

  constructor(input: string) {
    super(MESSAGES.invalidAmount, `Invalid amount to invest: "${input}"`);
    this.name = "InvestAmountError";
    this.input = input;
  }
}

export function isAllocationError(error: unknown): error is AllocationError {
  return error instanceof AllocationError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
