/**
 * Pickup locations keyed by name. The service only talks to the interface,
 * so a database-backed store can replace the in-memory one.
 */

import type { Address } from "../domain/address.js";

export interface PickupStore {
  /** Add or replace the location stored under `name` */
  add(name: string, address: Address): Promise<void>;
  get(name: string): Promise<Address | undefined>;
  list(): Promise<Array<{ name: string; address: Address }>>;
}

export class InMemoryPickupStore implements PickupStore {
  private readonly locations = new Map<string, Address>();

  async add(name: string, address: Address): Promise<void> {
    this.locations.set(name, address);
  }

  async get(name: string): Promise<Address | undefined> {
    return this.locations.get(name);
  }

  async list(): Promise<Array<{ name: string; address: Address }>> {
    return Array.from(this.locations, ([name, address]) => ({ name, address }));
  }
}
