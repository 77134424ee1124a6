import { isoRegionValidator, type RegionCodeValidator } from "../regions/validator.js";
import { ValidationError } from "./errors.js";

function normalizeSubdivision(country: string, subdivision: string): string {
  const upper = subdivision.trim().toUpperCase();
  return upper.startsWith(`${country}-`) ? upper : `${country}-${upper}`;
}

/**
 * A country, optionally narrowed to one of its ISO-3166-2 subdivisions.
 *
 * Instances are frozen; `code` is the catalog key (`"DE"`, `"US-CA"`).
 */
export class Region {
  readonly country: string;
  readonly subdivision: string | null;
  readonly code: string;

  private constructor(country: string, subdivisionCode: string | null) {
    this.country = country;
    this.subdivision = subdivisionCode === null ? null : subdivisionCode.slice(country.length + 1);
    this.code = subdivisionCode ?? country;
    Object.freeze(this);
  }

  /**
   * Validates the codes and builds a region. The subdivision may be given as
   * its suffix (`"CA"`) or as the full code (`"US-CA"`).
   */
  static create(
    country: string,
    subdivision?: string | null,
    validator: RegionCodeValidator = isoRegionValidator
  ): Region {
    const countryCode = country.trim().toUpperCase();
    if (!validator.isValidCountry(countryCode)) {
      throw new ValidationError("INVALID_COUNTRY", `Invalid country code: ${country}`, { country });
    }

    if (subdivision === undefined || subdivision === null || subdivision.trim() === "") {
      return new Region(countryCode, null);
    }

    const subdivisionCode = normalizeSubdivision(countryCode, subdivision);
    const check = validator.checkSubdivision(countryCode, subdivisionCode);

    if (check === "country_has_none") {
      throw new ValidationError(
        "UNEXPECTED_SUBDIVISION",
        `Unexpected subdivision code: ${subdivision} - ${countryCode} has no subdivisions.`,
        { country: countryCode, subdivision }
      );
    }

    if (check === "invalid") {
      throw new ValidationError("INVALID_SUBDIVISION", `Invalid subdivision code: ${subdivision}`, {
        country: countryCode,
        subdivision
      });
    }

    return new Region(countryCode, subdivisionCode);
  }

  static fromCode(code: string, validator: RegionCodeValidator = isoRegionValidator): Region {
    const [country = "", ...rest] = code.trim().split("-");
    return Region.create(country, rest.length > 0 ? rest.join("-") : null, validator);
  }

  sameCountry(other: Region): boolean {
    return this.country === other.country;
  }

  equals(other: Region): boolean {
    return this.code === other.code;
  }

  toString(): string {
    return this.code;
  }

  toJSON(): { country: string; subdivision: string | null; code: string } {
    return {
      country: this.country,
      subdivision: this.subdivision,
      code: this.code
    };
  }
}
