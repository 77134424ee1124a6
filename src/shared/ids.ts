import { v7 as uuidv7, validate as uuidValidate, version as uuidVersion } from "uuid";

// Time-ordered ids for batches and explanation nodes.
export function createId(): string {
  return uuidv7();
}

export function isId(value: string): boolean {
  return uuidValidate(value) && uuidVersion(value) === 7;
}
