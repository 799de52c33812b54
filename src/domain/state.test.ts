/**
 * Unit tests: state registry lookups.
 */

import { describe, it, expect } from "vitest";
import { STATES, displayState, isValidState } from "./state.js";
import { AddressResolverError } from "./errors.js";

describe("isValidState", () => {
  it("accepts registered codes", () => {
    expect(isValidState("NY")).toBe(true);
  });

  it("rejects codes outside the registry", () => {
    expect(isValidState("CA")).toBe(false);
    expect(isValidState("")).toBe(false);
  });

  it("matches keys exactly", () => {
    expect(isValidState("ny")).toBe(false);
    expect(isValidState("NY ")).toBe(false);
    expect(isValidState("New York")).toBe(false);
  });

  it("ignores inherited object properties", () => {
    expect(isValidState("toString")).toBe(false);
    expect(isValidState("constructor")).toBe(false);
  });
});

describe("displayState", () => {
  it("maps a code to its display name", () => {
    expect(displayState("NY")).toBe("New York");
  });

  it("throws LOOKUP_ERROR for unregistered codes", () => {
    expect(() => displayState("CA")).toThrow(AddressResolverError);
    expect(() => displayState("CA")).toThrow("CA is not a registered state");
  });

  it("has a display name for every registered code", () => {
    for (const [code, name] of Object.entries(STATES)) {
      expect(displayState(code)).toBe(name);
    }
  });
});
