/**
 * Address service facade: the boundary request handlers call.
 * Resolver errors come back as results; anything else (e.g. a store failure) propagates.
 */

import { Address } from "../domain/address.js";
import { formatError, isAddressResolverError } from "../domain/errors.js";
import type { ResolverResult } from "../domain/types.js";
import type { Geocoder } from "../geocoding/types.js";
import type { PickupStore } from "../store/pickup-store.js";
import { getLogger } from "../logger.js";

const log = getLogger("service");

export interface AddressServiceConfig {
  geocoder: Geocoder;
  store: PickupStore;
}

export interface PickupLocation {
  name: string;
  address: Address;
}

/** What a request handler returns to its client */
export type PickupResponse = { success: true } | { success: false; error: string };

export class AddressService {
  constructor(private readonly config: AddressServiceConfig) {}

  /** Validate and geocode caller input. */
  async resolve(input: unknown): Promise<ResolverResult<Address>> {
    return capture(() => Address.create(input, this.config.geocoder));
  }

  /** Restore a serialized address without re-validating or geocoding it. */
  load(text: string): ResolverResult<Address> {
    try {
      return { ok: true, value: Address.deserialize(text) };
    } catch (err) {
      if (isAddressResolverError(err)) return { ok: false, error: err };
      throw err;
    }
  }

  /**
   * Register a pickup location from a request body of the form `{ "<name>": <serialized address> }`.
   * The address may be the serialized string or the record object itself.
   */
  async addPickupLocation(body: string): Promise<ResolverResult<PickupLocation>> {
    return capture(async () => {
      const [name, value] = parsePickupBody(body);
      const address = typeof value === "string" ? Address.deserialize(value) : Address.fromRecord(value);
      await this.config.store.add(name, address);
      log.info({ name, address: address.toString() }, "pickup location added");
      return { name, address };
    });
  }

  /** `addPickupLocation` as a success flag or error message for the caller. */
  async pickup(body: string): Promise<PickupResponse> {
    const result = await this.addPickupLocation(body);
    if (result.ok) {
      return { success: true };
    }
    log.info({ err: result.error }, "pickup rejected");
    return { success: false, error: result.error.message };
  }
}

async function capture<T>(fn: () => Promise<T>): Promise<ResolverResult<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (err) {
    if (isAddressResolverError(err)) {
      return { ok: false, error: err };
    }
    throw err;
  }
}

function parsePickupBody(body: string): [string, unknown] {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (e) {
    throw formatError("Request body is not valid JSON", e);
  }
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw formatError("Invalid format.");
  }
  const entries = Object.entries(data);
  const only = entries[0];
  if (entries.length !== 1 || only === undefined) {
    throw formatError("Invalid format.");
  }
  return only;
}
