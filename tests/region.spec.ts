import { describe, expect, it } from "vitest";

import type { RegionCodeValidator } from "../src/domain/regions/validator.js";
import { ValidationError } from "../src/domain/tax/errors.js";
import { Region } from "../src/domain/tax/region.js";
import { captureError } from "./support.js";

describe("region", () => {
  it("normalizes a country-only region", () => {
    const region = Region.create(" de ");

    expect(region.country).toBe("DE");
    expect(region.subdivision).toBeNull();
    expect(region.code).toBe("DE");
  });

  it("accepts a subdivision as suffix or full code", () => {
    expect(Region.create("US", "CA").code).toBe("US-CA");
    expect(Region.create("us", "us-ca").code).toBe("US-CA");
    expect(Region.create("US", "CA").subdivision).toBe("CA");
  });

  it("treats an empty subdivision as absent", () => {
    expect(Region.create("FR", "").code).toBe("FR");
    expect(Region.create("FR", null).subdivision).toBeNull();
  });

  it("parses combined codes", () => {
    const region = Region.fromCode("ca-bc");

    expect(region.toJSON()).toEqual({ country: "CA", subdivision: "BC", code: "CA-BC" });
    expect(Region.fromCode("TH").code).toBe("TH");
  });

  it("rejects unknown or malformed country codes", () => {
    const unknown = captureError(() => Region.create("XX"));
    expect(unknown).toBeInstanceOf(ValidationError);
    expect(unknown).toMatchObject({ code: "INVALID_COUNTRY", statusCode: 400 });

    expect(captureError(() => Region.create("DEU"))).toMatchObject({ code: "INVALID_COUNTRY" });
  });

  it("rejects a subdivision that does not belong to the country", () => {
    expect(captureError(() => Region.create("US", "ZZ"))).toMatchObject({
      code: "INVALID_SUBDIVISION",
      details: { country: "US", subdivision: "ZZ" }
    });
  });

  it("rejects a subdivision for a country that has none", () => {
    const validator: RegionCodeValidator = {
      isValidCountry: () => true,
      checkSubdivision: () => "country_has_none"
    };

    expect(captureError(() => Region.create("MC", "01", validator))).toMatchObject({
      code: "UNEXPECTED_SUBDIVISION"
    });
  });

  it("compares regions by code and by country", () => {
    const bc = Region.fromCode("CA-BC");
    const on = Region.fromCode("CA-ON");

    expect(bc.sameCountry(on)).toBe(true);
    expect(bc.equals(on)).toBe(false);
    expect(bc.equals(Region.create("CA", "BC"))).toBe(true);
    expect(String(bc)).toBe("CA-BC");
  });

  it("is immutable", () => {
    expect(Object.isFrozen(Region.create("DE"))).toBe(true);
  });
});
