import type { ValidationCode, ValidationIssue } from "@/engine/validation";

export class StoreUnavailableError extends Error {
  readonly code = "STORE_UNAVAILABLE";

  constructor(readonly location: string, options?: { cause?: unknown }) {
    super(`Store at '${location}' is unavailable`, options);
    this.name = "StoreUnavailableError";
  }
}

export class StoreCorruptedError extends Error {
  readonly code = "STORE_CORRUPTED";

  constructor(readonly location: string, detail: string, options?: { cause?: unknown }) {
    super(`Store at '${location}' is corrupted: ${detail}`, options);
    this.name = "StoreCorruptedError";
  }
}

export type StoreError = StoreUnavailableError | StoreCorruptedError;

export function isStoreError(error: unknown): error is StoreError {
  return error instanceof StoreUnavailableError || error instanceof StoreCorruptedError;
}

export type TimekeeperErrorCode =
  | ValidationCode
  | "SCANNER_UNAVAILABLE"
  | "SCAN_INVALID"
  | "MATCH_NOT_FOUND"
  | StoreError["code"];

export interface TimekeeperError {
  code: TimekeeperErrorCode;
  message: string;
  cause?: unknown;
}

export type Outcome<T> = { ok: true; value: T } | { ok: false; error: TimekeeperError };

export function succeed<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function fail<T>(code: TimekeeperErrorCode, message: string, cause?: unknown): Outcome<T> {
  return { ok: false, error: { code, message, cause } };
}

export function failFromIssue<T>(issue: ValidationIssue): Outcome<T> {
  return fail(issue.code, issue.message);
}

export function failFromStore<T>(error: StoreError): Outcome<T> {
  return fail(error.code, error.message, error);
}

const MESSAGES: Record<TimekeeperErrorCode, string> = {
  DESCRIPTION_EMPTY: "Match description cannot be empty.",
  DESCRIPTION_TOO_LONG: "Match description must be 200 characters or less.",
  MATCH_ID_EMPTY: "Match ID cannot be empty.",
  MATCH_ID_INVALID: "Invalid match ID format. Please check and try again.",
  SCANNER_UNAVAILABLE: "QR scanner unavailable. Please use manual entry.",
  SCAN_INVALID: "QR code could not be decoded or contains invalid data.",
  MATCH_NOT_FOUND: "Match not found. It may have been deleted.",
  MATCH_INACTIVE: "Cannot modify a match that has been stopped.",
  NOT_MATCH_ADMIN: "Only the match admin can control this timer. Please contact support if this is unexpected.",
  UNKNOWN_OPERATION: "That timer operation is not supported.",
  STORE_UNAVAILABLE: "Match storage is unavailable. Please contact support.",
  STORE_CORRUPTED: "Match storage data is corrupted. Please contact support.",
};

export function describeError(error: TimekeeperError): string {
  return MESSAGES[error.code];
}
