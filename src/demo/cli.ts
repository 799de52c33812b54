#!/usr/bin/env node
/**
 * CLI demo: resolve a sample address, then round-trip it through a pickup registration.
 * Run: npm run demo
 * With MAPBOX_ACCESS_TOKEN set: live Mapbox lookup. Without: stub mode.
 */

import {
  AddressService,
  FetchHttpClient,
  InMemoryPickupStore,
  MapboxGeocoder,
  loadConfig,
  type Geocoder,
} from "../index.js";
import { StubHttpClient, jsonResponse } from "../http/stub-client.js";

const sampleAddress = {
  street1: "123 Main St",
  street2: "Apt 4",
  city: "Troy",
  state: "NY",
  zip: 12180,
};

function stubGeocoder(): Geocoder {
  const stub = new StubHttpClient();
  stub.setResponse(
    jsonResponse({
      type: "FeatureCollection",
      features: [{ place_name: "123 Main St, Troy, New York 12180", center: [-73.6918, 42.7284] }],
    })
  );
  return new MapboxGeocoder({ baseUrl: "https://api.mapbox.com", accessToken: "stub" }, stub);
}

async function main() {
  let geocoder: Geocoder;
  if (process.env.MAPBOX_ACCESS_TOKEN) {
    const config = loadConfig(process.env);
    geocoder = new MapboxGeocoder(
      {
        baseUrl: config.MAPBOX_BASE_URL,
        accessToken: config.MAPBOX_ACCESS_TOKEN,
        endpoint: config.MAPBOX_ENDPOINT,
        timeoutMs: config.HTTP_TIMEOUT_MS,
      },
      new FetchHttpClient()
    );
    console.log("Resolving address with Mapbox (live)...\n");
  } else {
    geocoder = stubGeocoder();
    console.log("Resolving address (stub mode; set MAPBOX_ACCESS_TOKEN for live lookups)...\n");
  }

  const store = new InMemoryPickupStore();
  const service = new AddressService({ geocoder, store });

  const resolved = await service.resolve(sampleAddress);
  if (!resolved.ok) {
    console.error("Error:", resolved.error.toJSON());
    process.exitCode = 1;
    return;
  }
  const address = resolved.value;
  console.log("Address:", address.toString());
  console.log("State:", address.stateName);
  console.log("Coordinates:", address.coordinates.join(", "));
  console.log("Serialized:", address.serialize());

  const pickup = await service.pickup(JSON.stringify({ "Main St Bakery": address.serialize() }));
  console.log("Pickup:", pickup);
  console.log("Stored:", (await store.list()).map((l) => l.name));
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
