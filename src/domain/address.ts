/**
 * Address entity: a validated postal address with resolved coordinates.
 *
 * Two ways in:
 * - `Address.create` validates caller input and geocodes it. Fails atomically.
 * - `Address.deserialize` / `Address.fromRecord` rebuild a previously serialized address.
 *   These trust the record's contents and skip validation and geocoding; use them only
 *   for records this service produced.
 */

import { formatError, resolutionError } from "./errors.js";
import { displayState } from "./state.js";
import type { AddressFields, AddressRecord, Coordinates, ResolverResult } from "./types.js";
import { parseAddressRecord, validateAddressFields } from "./validation.js";
import type { Geocoder } from "../geocoding/types.js";
import { getLogger } from "../logger.js";

const log = getLogger("address");

/** Search text sent to the geocoder: "<street1>, <city>, <state> <zip>" */
export function buildSearchText(fields: AddressFields): string {
  return `${fields.street1}, ${fields.city}, ${fields.state} ${fields.zip}`;
}

/** "<street1>[, <street2>], <city>, <state> <zip>." */
export function formatAddress(fields: AddressFields): string {
  const street2 = fields.street2 ? `, ${fields.street2}` : "";
  return `${fields.street1}${street2}, ${fields.city}, ${fields.state} ${fields.zip}.`;
}

export class Address implements AddressFields {
  readonly street1: string;
  readonly street2?: string;
  readonly city: string;
  readonly state: string;
  readonly zip: number;
  readonly coordinates: Coordinates;

  private constructor(fields: AddressFields, coordinates: Coordinates) {
    this.street1 = fields.street1;
    if (fields.street2) this.street2 = fields.street2;
    this.city = fields.city;
    this.state = fields.state;
    this.zip = fields.zip;
    // + 0 turns -0 into 0, which JSON cannot tell apart
    this.coordinates = Object.freeze([coordinates[0] + 0, coordinates[1] + 0] as const);
    Object.freeze(this);
  }

  /**
   * Validate caller input and resolve its coordinates.
   * Throws VALIDATION_ERROR before any network call, or RESOLUTION_ERROR when the geocoder fails.
   */
  static async create(input: unknown, geocoder: Geocoder): Promise<Address> {
    const fields = validateAddressFields(input);
    const search = buildSearchText(fields);
    let result: ResolverResult<Coordinates>;
    try {
      result = await geocoder.geocode(search);
    } catch (err) {
      log.warn({ err, search }, "geocoder threw");
      throw resolutionError(`Could not get coordinates for ${formatAddress(fields)}`, err);
    }
    if (!result.ok) {
      log.warn({ err: result.error, search }, "geocoding failed");
      throw resolutionError(`Could not get coordinates for ${formatAddress(fields)}`, result.error);
    }
    return new Address(fields, result.value);
  }

  /** Rebuild from a parsed wire record (trusted: no validation, no geocoding) */
  static fromRecord(record: unknown): Address {
    const r = parseAddressRecord(record);
    return new Address(
      {
        street1: r.street1,
        street2: r.street2 ?? undefined,
        city: r.city,
        state: r.state,
        zip: r.zip,
      },
      r.coordinates
    );
  }

  /** Rebuild from `serialize()` output (trusted: no validation, no geocoding) */
  static deserialize(text: string): Address {
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (e) {
      throw formatError("Serialized address is not valid JSON", e);
    }
    return Address.fromRecord(data);
  }

  /** Display name of the state, e.g. "New York" */
  get stateName(): string {
    return displayState(this.state);
  }

  toRecord(): AddressRecord {
    return {
      street1: this.street1,
      street2: this.street2 ?? null,
      city: this.city,
      state: this.state,
      zip: this.zip,
      coordinates: [this.coordinates[0], this.coordinates[1]],
    };
  }

  toJSON(): AddressRecord {
    return this.toRecord();
  }

  serialize(): string {
    return JSON.stringify(this.toRecord());
  }

  equals(other: Address): boolean {
    return (
      this.street1 === other.street1 &&
      this.street2 === other.street2 &&
      this.city === other.city &&
      this.state === other.state &&
      this.zip === other.zip &&
      this.coordinates[0] === other.coordinates[0] &&
      this.coordinates[1] === other.coordinates[1]
    );
  }

  toString(): string {
    return formatAddress(this);
  }
}
