/**
 * PO Token Parser
 *
 * Pure mapping from OCR text to a Purchase Order identifier.
 */

import type { ClassificationOutcome, PoToken } from '../types';

/**
 * Optional run of uppercase letters, literal "PO", one or more digits.
 * Case-sensitive; matches prefixed numbers such as `PPO77` or `APO1023`.
 */
export const PO_TOKEN_PATTERN = /[A-Z]*PO[0-9]+/;

/**
 * Return the leftmost PO token in `text`, or null when there is none.
 */
export function parsePoToken(text: string): PoToken | null {
  const match = PO_TOKEN_PATTERN.exec(text);
  return match ? match[0] : null;
}

export function classifyText(text: string): ClassificationOutcome {
  const token = parsePoToken(text);
  return token ? { kind: 'classified', token } : { kind: 'unclassified' };
}
