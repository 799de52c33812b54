/**
 * Integration tests: AddressService with the Mapbox geocoder on a stubbed HTTP client.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { AddressService } from "./address-service.js";
import { MapboxGeocoder } from "../geocoding/mapbox.js";
import { StubHttpClient, jsonResponse } from "../http/stub-client.js";
import { InMemoryPickupStore, type PickupStore } from "../store/pickup-store.js";
import { Address } from "../domain/address.js";
import { AddressResolverError } from "../domain/errors.js";

const troyRecord = {
  street1: "123 Main St",
  street2: null,
  city: "Troy",
  state: "NY",
  zip: 12180,
  coordinates: [42.7284, -73.6918],
};

function geocodeSuccess() {
  return jsonResponse({ features: [{ center: [-73.6918, 42.7284] }] });
}

describe("AddressService integration", () => {
  let http: StubHttpClient;
  let store: InMemoryPickupStore;
  let service: AddressService;

  beforeEach(() => {
    http = new StubHttpClient();
    store = new InMemoryPickupStore();
    const geocoder = new MapboxGeocoder({ baseUrl: "https://api.mapbox.com", accessToken: "test-token" }, http);
    service = new AddressService({ geocoder, store });
  });

  describe("resolve", () => {
    it("returns a resolved address for valid input", async () => {
      http.setResponse(geocodeSuccess());
      const result = await service.resolve({ street1: "123 Main St", city: "Troy", state: "NY", zip: 12180 });
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.coordinates).toEqual([42.7284, -73.6918]);
        expect(result.value.toString()).toBe("123 Main St, Troy, NY 12180.");
      }
    });

    it("returns VALIDATION_ERROR without calling the geocoder", async () => {
      const result = await service.resolve({ street1: "123 Main St", city: "Troy", state: "NJ", zip: 12180 });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(AddressResolverError);
        expect(result.error.details.code).toBe("VALIDATION_ERROR");
        expect(result.error.message).toBe("NJ is not a valid state");
      }
      expect(http.getRecordedRequests()).toHaveLength(0);
    });

    it("returns RESOLUTION_ERROR when Mapbox fails", async () => {
      http.setResponse({ status: 503, headers: {}, body: "Service Unavailable" });
      const result = await service.resolve({ street1: "123 Main St", city: "Troy", state: "NY", zip: 12180 });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe("RESOLUTION_ERROR");
        expect(result.error.message).toBe("Could not get coordinates for 123 Main St, Troy, NY 12180.");
      }
    });
  });

  describe("load", () => {
    it("restores a serialized address", () => {
      const result = service.load(JSON.stringify(troyRecord));
      expect(result.ok).toBe(true);
      if (result.ok) expect(result.value.toRecord()).toEqual(troyRecord);
    });

    it("returns FORMAT_ERROR for malformed text", () => {
      const result = service.load("{");
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe("FORMAT_ERROR");
    });
  });

  describe("pickup", () => {
    it("stores a serialized address under its name", async () => {
      const response = await service.pickup(JSON.stringify({ "Main St Bakery": JSON.stringify(troyRecord) }));
      expect(response).toEqual({ success: true });
      const stored = await store.get("Main St Bakery");
      expect(stored?.equals(Address.fromRecord(troyRecord))).toBe(true);
      expect(http.getRecordedRequests()).toHaveLength(0);
    });

    it("accepts the record object as the value", async () => {
      const response = await service.pickup(JSON.stringify({ "Main St Bakery": troyRecord }));
      expect(response).toEqual({ success: true });
      expect((await store.list()).map((l) => l.name)).toEqual(["Main St Bakery"]);
    });

    it("replaces a location registered under the same name", async () => {
      await service.pickup(JSON.stringify({ Bakery: troyRecord }));
      await service.pickup(JSON.stringify({ Bakery: { ...troyRecord, street1: "5 River St" } }));
      const list = await store.list();
      expect(list).toHaveLength(1);
      expect(list[0].address.street1).toBe("5 River St");
    });

    it.each([
      ["two names", JSON.stringify({ a: troyRecord, b: troyRecord })],
      ["no names", "{}"],
      ["an array", JSON.stringify([troyRecord])],
      ["a string", JSON.stringify("Bakery")],
    ])("rejects a body with %s", async (_label, body) => {
      expect(await service.pickup(body)).toEqual({ success: false, error: "Invalid format." });
      expect(await store.list()).toEqual([]);
    });

    it("rejects a body that is not JSON", async () => {
      expect(await service.pickup("name=Bakery")).toEqual({
        success: false,
        error: "Request body is not valid JSON",
      });
    });

    it("rejects a malformed address record", async () => {
      const response = await service.pickup(JSON.stringify({ Bakery: { street1: "123 Main St" } }));
      expect(response.success).toBe(false);
      if (!response.success) {
        expect(response.error).toBe(
          "Malformed address record: city: Required; state: Required; zip: Required; coordinates: Required"
        );
      }
    });

    it("returns the stored location from addPickupLocation", async () => {
      const result = await service.addPickupLocation(JSON.stringify({ Bakery: troyRecord }));
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.name).toBe("Bakery");
        expect(result.value.address.stateName).toBe("New York");
      }
    });

    it("propagates store failures", async () => {
      const failing: PickupStore = {
        add: async () => {
          throw new Error("store unavailable");
        },
        get: async () => undefined,
        list: async () => [],
      };
      const geocoder = new MapboxGeocoder({ baseUrl: "https://api.mapbox.com", accessToken: "test-token" }, http);
      const withFailingStore = new AddressService({ geocoder, store: failing });
      await expect(withFailingStore.pickup(JSON.stringify({ Bakery: troyRecord }))).rejects.toThrow(
        "store unavailable"
      );
    });
  });
});
