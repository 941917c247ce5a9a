import { ulid } from "ulid";

export type IdPrefix = "run";

export function newId(prefix: IdPrefix): `${IdPrefix}_${string}` {
  return `${prefix}_${ulid()}`;
}
