/** Longest line of player input the simulation keeps. */
export const MAX_INPUT_LENGTH = 100;

const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f]/g;
const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;
const MAX_CHOICE = 2_147_483_647;
const MIN_CHOICE = -2_147_483_648;

/**
 * Normalizes a raw line of player input before any state sees it.
 */
export function sanitizeInput(raw: string): string {
  return raw.replace(CONTROL_CHARACTERS, "").trim().slice(0, MAX_INPUT_LENGTH);
}

/**
 * Parses a menu selection. Returns undefined for anything that is not a
 * whole number in the 32-bit signed range.
 */
export function parseChoice(input: string): number | undefined {
  if (!INTEGER_PATTERN.test(input)) return undefined;
  const value = Number.parseInt(input, 10);
  if (!Number.isSafeInteger(value) || value > MAX_CHOICE || value < MIN_CHOICE) {
    return undefined;
  }
  return value;
}
