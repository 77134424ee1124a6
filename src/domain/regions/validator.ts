import countries from "i18n-iso-countries";
import { iso31662 } from "iso-3166";

export type SubdivisionCheck = "valid" | "invalid" | "country_has_none";

export interface RegionCodeValidator {
  isValidCountry(country: string): boolean;
  checkSubdivision(country: string, subdivisionCode: string): SubdivisionCheck;
}

const subdivisionsByCountry = new Map<string, Set<string>>();

for (const entry of iso31662) {
  const country = entry.code.slice(0, entry.code.indexOf("-"));
  const known = subdivisionsByCountry.get(country);
  if (known) {
    known.add(entry.code);
  } else {
    subdivisionsByCountry.set(country, new Set([entry.code]));
  }
}

// ISO-3166-1 alpha-2 countries and ISO-3166-2 subdivisions.
export const isoRegionValidator: RegionCodeValidator = {
  isValidCountry(country) {
    return /^[A-Z]{2}$/.test(country) && countries.isValid(country);
  },

  checkSubdivision(country, subdivisionCode) {
    const known = subdivisionsByCountry.get(country);
    if (!known || known.size === 0) {
      return "country_has_none";
    }

    return known.has(subdivisionCode) ? "valid" : "invalid";
  }
};
