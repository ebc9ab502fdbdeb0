/**
 * Read and write a record's lookup foreign key by name
 *
 * @example
 * ```typescript
 * const carType = bindLookupAttribute(carTypes, "car_type_id");
 * const car = { model: "Roadster", car_type_id: null };
 * await carType.assign(car, "Sports"); // car.car_type_id === 1
 * await carType.read(car);             // "Sports"
 * ```
 */

import type { InternCache } from "./intern-cache.js";

/**
 * Records carrying a nullable lookup id in field F
 */
export type WithLookupId<F extends string> = { [K in F]?: number | null };

export interface LookupAttribute<F extends string> {
  /** Foreign-key field this binding reads and writes */
  readonly idField: F;
  /** Name behind the record's id, or null when unset */
  read(record: WithLookupId<F>): Promise<string | null>;
  /** Set the record's id from a name (created on first use); null clears it */
  assign(record: WithLookupId<F>, name: string | null): Promise<void>;
  /** Filter matching records whose attribute equals the name */
  criteria(name: string): Promise<WithLookupId<F>>;
}

export function bindLookupAttribute<F extends string>(
  cache: InternCache,
  idField: F
): LookupAttribute<F> {
  return {
    idField,

    async read(record) {
      const id: number | null | undefined = record[idField];
      if (id === null || id === undefined) {
        return null;
      }
      return cache.nameFor(id);
    },

    async assign(record, name) {
      record[idField] = name === null ? null : await cache.idFor(name);
    },

    async criteria(name) {
      const id = await cache.idFor(name);
      const filter: WithLookupId<F> = {};
      filter[idField] = id;
      return filter;
    },
  };
}
