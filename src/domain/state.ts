/**
 * Registry of supported states: code to display name.
 * Supporting another state means adding an entry here.
 */

import { lookupError } from "./errors.js";

export const STATES = {
  NY: "New York",
} as const satisfies Record<string, string>;

export type StateCode = keyof typeof STATES;

/** True iff the code is an exact key of the registry */
export function isValidState(code: string): code is StateCode {
  return Object.hasOwn(STATES, code);
}

/** Display name for a registered code; throws LOOKUP_ERROR otherwise */
export function displayState(code: string): string {
  if (!isValidState(code)) {
    throw lookupError(code);
  }
  return STATES[code];
}
