import { fileURLToPath } from "node:url";

import { TaxDatabase } from "../src/domain/rulesets/database.js";

export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

export function loadFixtureDatabase(): TaxDatabase {
  return TaxDatabase.fromFiles(fixturePath("rates.json"), fixturePath("agreements.json"));
}

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }

  throw new Error("Expected the call to throw.");
}
