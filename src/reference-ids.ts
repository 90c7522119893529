import { randomInt } from "node:crypto";
import type { ChatMessage } from "./chat-types.js";

export const MIN_REFERENCE_ID_DIGITS = 3;
const DRAWS_PER_WIDTH = 3;

export type ReferenceIdMap = Map<number, string>;

/**
 * Allocate a short lowercase hex id that is not in `existing`, and add it.
 *
 * Draws a few random values at the current width and widens by one digit
 * whenever every draw collides, so allocation always terminates.
 */
export function generateReferenceId(existing: Set<string>, minDigits = MIN_REFERENCE_ID_DIGITS): string {
  let digits = Math.max(1, minDigits);
  while (true) {
    const space = 16 ** digits;
    for (let attempt = 0; attempt < DRAWS_PER_WIDTH; attempt += 1) {
      const candidate = drawHex(space).padStart(digits, "0");
      if (!existing.has(candidate)) {
        existing.add(candidate);
        return candidate;
      }
    }
    digits += 1;
  }
}

export function isReferenceId(value: string): boolean {
  if (!value || /\s/.test(value)) {
    return false;
  }
  if (value.length < MIN_REFERENCE_ID_DIGITS) {
    return false;
  }
  return /^[0-9a-fA-F]+$/.test(value);
}

export function assignReferenceIds(count: number, existing: Set<string>): string[] {
  const ids: string[] = [];
  for (let i = 0; i < count; i += 1) {
    ids.push(generateReferenceId(existing));
  }
  return ids;
}

export function buildReferenceIdMap(messages: readonly ChatMessage[]): ReferenceIdMap {
  const map: ReferenceIdMap = new Map();
  messages.forEach((message, index) => {
    if (message.referenceId) {
      map.set(index, message.referenceId);
    }
  });
  return map;
}

export function getMessageIndex(
  referenceId: string,
  source: readonly ChatMessage[] | ReferenceIdMap,
): number | null {
  const needle = referenceId.trim().toLowerCase();
  if (!needle) {
    return null;
  }
  const map = source instanceof Map ? source : buildReferenceIdMap(source);
  for (const [index, id] of map) {
    if (id === needle) {
      return index;
    }
  }
  return null;
}

export function getReferenceId(
  index: number,
  source: readonly ChatMessage[] | ReferenceIdMap,
): string | null {
  if (source instanceof Map) {
    return source.get(index) ?? null;
  }
  return source[index]?.referenceId ?? null;
}

function drawHex(space: number): string {
  // randomInt only accepts ranges below 2^48.
  if (space < 2 ** 48) {
    return randomInt(0, space).toString(16);
  }
  return Math.floor(Math.random() * space).toString(16);
}
