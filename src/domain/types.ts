/**
 * Domain types for address resolution.
 * Geocoder-specific payloads stay inside the geocoding adapters.
 */

import type { AddressResolverError } from "./errors.js";

/** Geographic position, latitude first */
export type Coordinates = readonly [latitude: number, longitude: number];

/** Caller-supplied address fields after validation */
export interface AddressFields {
  street1: string;
  /** Second address line (apartment, suite); absent when not given */
  street2?: string;
  city: string;
  /** State code, a member of the state registry */
  state: string;
  zip: number;
}

/**
 * Wire record of a resolved address.
 * Keys match the Address attribute names; street2 is null when absent.
 */
export interface AddressRecord {
  street1: string;
  street2: string | null;
  city: string;
  state: string;
  zip: number;
  coordinates: [number, number];
}

/** Result of an operation that can fail with a structured error */
export type ResolverResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: AddressResolverError };
