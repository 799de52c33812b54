/**
 * Builds Mapbox Geocoding API v5 URLs and maps its response to domain coordinates.
 * Mapbox payload shapes stay in this file.
 */

import { z } from "zod";
import { malformedResponseError } from "../domain/errors.js";
import type { Coordinates } from "../domain/types.js";

const GEOCODING_PATH = "/geocoding/v5";

export type MapboxEndpoint = "mapbox.places" | "mapbox.places-permanent";

export interface MapboxUrlOptions {
  baseUrl: string;
  endpoint: MapboxEndpoint;
  accessToken: string;
}

/** `{base}/geocoding/v5/{endpoint}/{search}.json?access_token={token}` */
export function buildGeocodeUrl(options: MapboxUrlOptions, searchText: string): string {
  const base = options.baseUrl.replace(/\/$/, "");
  const search = encodeURIComponent(searchText);
  const token = encodeURIComponent(options.accessToken);
  return `${base}${GEOCODING_PATH}/${options.endpoint}/${search}.json?access_token=${token}`;
}

const featureCollectionSchema = z.object({
  features: z.array(z.unknown()),
});

/** GeoJSON position: [longitude, latitude] */
const featureSchema = z.object({
  center: z.tuple([z.number(), z.number()]),
});

/**
 * Parse a Mapbox response body into coordinates from the first feature.
 * Mapbox orders `center` longitude first; the result is latitude first.
 */
export function parseGeocodeResponse(body: string): Coordinates {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (e) {
    throw malformedResponseError("Malformed JSON in geocoding response", e);
  }
  const collection = featureCollectionSchema.safeParse(data);
  if (!collection.success) {
    throw malformedResponseError("Geocoding response has no features array", collection.error);
  }
  const first = collection.data.features[0];
  if (first === undefined) {
    throw malformedResponseError("Geocoding response has no features");
  }
  const feature = featureSchema.safeParse(first);
  if (!feature.success) {
    throw malformedResponseError("First geocoding feature has no valid center", feature.error);
  }
  const [longitude, latitude] = feature.data.center;
  return [latitude, longitude];
}
