/**
 * Runtime validation for address input and wire records using Zod.
 * Validate all caller input before calling the geocoding API.
 */

import { z } from "zod";
import { formatError, validationError } from "./errors.js";
import { isValidState } from "./state.js";
import type { AddressFields, AddressRecord } from "./types.js";

/** Any falsy value reads as empty; a truthy value of the wrong type gets its own message. */
function fieldErrors(field: string, expected: string): { errorMap: z.ZodErrorMap } {
  return {
    errorMap: (issue, ctx) => {
      if (issue.code === z.ZodIssueCode.invalid_type) {
        return { message: ctx.data ? `${field} must be ${expected}` : `${field} cannot be empty` };
      }
      return { message: ctx.defaultError };
    },
  };
}

function requiredText(field: string) {
  return z.string(fieldErrors(field, "a string")).min(1, `${field} cannot be empty`);
}

// Key order is the order errors are reported in.
const addressFieldsSchema = z
  .object(
    {
      street1: requiredText("street1"),
      street2: z
        .string(fieldErrors("street2", "a string"))
        .nullish()
        .transform((v) => v || undefined),
      city: requiredText("city"),
      state: requiredText("state"),
      zip: z
        .number(fieldErrors("zip", "an integer"))
        .int("zip must be an integer")
        .refine((v) => v !== 0, "zip cannot be empty"),
    },
    fieldErrors("address", "an object")
  )
  .superRefine((fields, ctx) => {
    if (fields.state && !isValidState(fields.state)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["state"],
        message: `${fields.state} is not a valid state`,
      });
    }
  });

/** Safe parse: returns { success: true, data } or { success: false, error } */
export function parseAddressFields(input: unknown): z.SafeParseReturnType<unknown, AddressFields> {
  return addressFieldsSchema.safeParse(input);
}

/**
 * Validate caller-supplied address fields.
 * Throws VALIDATION_ERROR naming the first offending field, in the order street1, city, state, zip.
 */
export function validateAddressFields(input: unknown): AddressFields {
  const result = parseAddressFields(input);
  if (!result.success) {
    const first = result.error.issues[0];
    const field = first?.path[0];
    throw validationError(
      first?.message ?? "Invalid address",
      typeof field === "string" ? field : undefined,
      result.error
    );
  }
  return result.data;
}

const addressRecordSchema = z.object({
  street1: z.string(),
  street2: z.string().nullish().transform((v) => v ?? null),
  city: z.string(),
  state: z.string(),
  zip: z.number(),
  coordinates: z.tuple([z.number(), z.number()]),
});

/**
 * Check the shape of a wire record. Only types and presence are checked:
 * field contents, the state registry and coordinates are taken as encoded.
 */
export function parseAddressRecord(input: unknown): AddressRecord {
  const result = addressRecordSchema.safeParse(input);
  if (!result.success) {
    const msg = result.error.errors.map((e) => `${e.path.join(".") || "record"}: ${e.message}`).join("; ");
    throw formatError(`Malformed address record: ${msg}`, result.error);
  }
  return result.data;
}
