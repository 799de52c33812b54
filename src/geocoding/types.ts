/**
 * Geocoder abstraction: the address resolver depends only on this interface.
 * Another provider is a new implementation, not a change to the resolver.
 */

import type { Coordinates, ResolverResult } from "../domain/types.js";

export interface Geocoder {
  /**
   * Resolve free-text search to coordinates (latitude first).
   * Failures come back as `{ ok: false }`; implementations do not throw for API or transport errors.
   */
  geocode(searchText: string): Promise<ResolverResult<Coordinates>>;
}
