import { DecodeError } from '../errors.js';
import type { Dimension, FlatRecord, ObservationMap } from '../types.js';

const INDEX_TOKEN = /^[+-]?\d+$/;

export function parseObservationKey(key: string): number[] {
  return key.split(':').map((token) => {
    const trimmed = token.trim();
    if (!INDEX_TOKEN.test(trimmed)) {
      throw new DecodeError(key, `"${token}" is not an integer index`);
    }
    return Number.parseInt(trimmed, 10);
  });
}

/**
 * Turns a sparse observation map into one flat record per observation.
 *
 * Each key position selects a value from the dimension at the same position.
 * Indices outside a dimension's value list leave that field off the record;
 * the cleaner drops records missing a required dimension. A single malformed
 * key rejects the whole map.
 */
export function decode(observations: ObservationMap, dimensions: readonly Dimension[]): FlatRecord[] {
  const records: FlatRecord[] = [];

  for (const [key, values] of Object.entries(observations)) {
    const indices = parseObservationKey(key);
    const record: FlatRecord = {};

    dimensions.forEach((dimension, position) => {
      if (position >= indices.length) return;
      const index = indices[position];
      if (index < 0 || index >= dimension.values.length) return;
      record[dimension.name] = dimension.values[index].name;
    });

    const [value] = values;
    if (value !== undefined && value !== null) {
      record.value = value;
    }

    records.push(record);
  }

  return records;
}
