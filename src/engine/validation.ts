import { MAX_DESCRIPTION_LENGTH } from "@/config";
import { isMatchId } from "@/engine/identifier";
import type { ID } from "@/models";

export type ValidationCode =
  | "DESCRIPTION_EMPTY"
  | "DESCRIPTION_TOO_LONG"
  | "MATCH_ID_EMPTY"
  | "MATCH_ID_INVALID"
  | "MATCH_INACTIVE"
  | "NOT_MATCH_ADMIN"
  | "UNKNOWN_OPERATION";

export interface ValidationIssue {
  level: "error" | "warning" | "info";
  code: ValidationCode;
  message: string;
  entity?: { kind: "match" | "user"; id: ID };
}

export interface ValidationResult {
  ok: boolean;
  issues: ValidationIssue[];
}

export const VALID: ValidationResult = { ok: true, issues: [] };

export function failure(code: ValidationCode, message: string, entity?: ValidationIssue["entity"]): ValidationResult {
  return {
    ok: false,
    issues: [{ level: "error", code, message, entity }],
  };
}

export function validateDescription(description: string): ValidationResult {
  const trimmed = description.trim();
  if (trimmed.length === 0) {
    return failure("DESCRIPTION_EMPTY", "Match description cannot be empty.");
  }
  if (trimmed.length > MAX_DESCRIPTION_LENGTH) {
    return failure(
      "DESCRIPTION_TOO_LONG",
      `Match description must be ${MAX_DESCRIPTION_LENGTH} characters or less (got ${trimmed.length}).`,
    );
  }
  return VALID;
}

export function validateMatchId(raw: string): ValidationResult {
  const trimmed = raw.trim();
  if (trimmed.length === 0) {
    return failure("MATCH_ID_EMPTY", "Match id cannot be empty.");
  }
  if (!isMatchId(trimmed)) {
    return failure("MATCH_ID_INVALID", `'${trimmed}' is not a valid match id.`);
  }
  return VALID;
}

export function firstIssue(result: ValidationResult): ValidationIssue | undefined {
  return result.issues.find((issue) => issue.level === "error");
}
