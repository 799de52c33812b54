/**
 * Mapbox geocoder: one GET per lookup, status and transport errors mapped to structured results.
 */

import type { Geocoder } from "./types.js";
import type { Coordinates, ResolverResult } from "../domain/types.js";
import { isHttpTimeout, type IHttpClient } from "../http/client.js";
import {
  authError,
  geocoderError,
  isAddressResolverError,
  networkError,
  rateLimitError,
  timeoutError,
} from "../domain/errors.js";
import { buildGeocodeUrl, parseGeocodeResponse, type MapboxEndpoint } from "./mapbox-mapper.js";
import { getLogger } from "../logger.js";

const log = getLogger("geocoding");

export interface MapboxGeocoderConfig {
  baseUrl: string;
  accessToken: string;
  endpoint?: MapboxEndpoint;
  timeoutMs?: number;
}

export class MapboxGeocoder implements Geocoder {
  constructor(
    private readonly config: MapboxGeocoderConfig,
    private readonly http: IHttpClient
  ) {}

  async geocode(searchText: string): Promise<ResolverResult<Coordinates>> {
    try {
      const url = buildGeocodeUrl(
        {
          baseUrl: this.config.baseUrl,
          endpoint: this.config.endpoint ?? "mapbox.places",
          accessToken: this.config.accessToken,
        },
        searchText
      );
      log.debug({ search: searchText }, "geocoding request");

      const res = await this.http.send({
        method: "GET",
        url,
        headers: { Accept: "application/json" },
        timeoutMs: this.config.timeoutMs ?? 10_000,
      });

      if (res.status === 401 || res.status === 403) {
        return { ok: false, error: authError(`Mapbox rejected the access token (${res.status})`, res.status) };
      }
      if (res.status === 429) {
        const retryAfter = res.headers["retry-after"];
        return {
          ok: false,
          error: rateLimitError(retryAfter ? parseInt(retryAfter, 10) : undefined),
        };
      }
      if (res.status !== 200) {
        return {
          ok: false,
          error: geocoderError(`Mapbox returned ${res.status}: ${res.body.slice(0, 200)}`, res.status),
        };
      }

      return { ok: true, value: parseGeocodeResponse(res.body) };
    } catch (err) {
      if (isAddressResolverError(err)) {
        return { ok: false, error: err };
      }
      if (isHttpTimeout(err)) {
        return { ok: false, error: timeoutError("Mapbox geocoding") };
      }
      return {
        ok: false,
        error: networkError(
          err instanceof Error ? err.message : "Unknown error during geocoding request",
          err
        ),
      };
    }
  }
}
