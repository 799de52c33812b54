/**
 * Pickup Address Resolver
 *
 * Public API: address entity, state registry, geocoders, service facade and errors.
 */

export * from "./domain/index.js";
export type { Geocoder } from "./geocoding/types.js";
export { MapboxGeocoder } from "./geocoding/mapbox.js";
export type { MapboxGeocoderConfig } from "./geocoding/mapbox.js";
export { buildGeocodeUrl, parseGeocodeResponse } from "./geocoding/mapbox-mapper.js";
export type { MapboxEndpoint } from "./geocoding/mapbox-mapper.js";
export { AddressService } from "./service/address-service.js";
export type { AddressServiceConfig, PickupLocation, PickupResponse } from "./service/address-service.js";
export { InMemoryPickupStore } from "./store/pickup-store.js";
export type { PickupStore } from "./store/pickup-store.js";
export { FetchHttpClient, HttpError } from "./http/client.js";
export type { IHttpClient, HttpRequest, HttpResponse } from "./http/client.js";
export { loadConfig } from "./config.js";
export type { Config } from "./config.js";
export { getLogger } from "./logger.js";
