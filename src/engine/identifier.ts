import { randomUUID } from "node:crypto";

import type { ID } from "@/models";

const MATCH_ID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

export function generateMatchId(): ID {
  return randomUUID();
}

export function isMatchId(value: string): boolean {
  return MATCH_ID_PATTERN.test(value);
}

/** Pull a match id out of raw scanner text; surrounding whitespace is ignored. */
export function extractMatchIdFromScan(scanText: string): ID | undefined {
  const candidate = scanText.trim();
  return isMatchId(candidate) ? candidate : undefined;
}

