/**
 * Runtime values flowing through the codec.
 *
 * The SQL type of a value is never read from the value itself: every consumer walks
 * a value together with the `DataType` that describes it.
 */

export type Value =
  | null
  | boolean
  | number
  | bigint
  | string
  | Date
  | Uint8Array
  | readonly Value[]
  | MapData;

/**
 * Ordered map value, kept as parallel key/value arrays.
 */
export interface MapData {
  readonly keys: readonly Value[];
  readonly values: readonly Value[];
}

/**
 * A struct value: one entry per schema field, in schema order.
 */
export type Row = readonly Value[];

export function isMapData(value: Value): value is MapData {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date) &&
    !(value instanceof Uint8Array)
  );
}

export function isValueArray(value: Value): value is readonly Value[] {
  return Array.isArray(value);
}

export function mapData(entries: ReadonlyArray<readonly [Value, Value]>): MapData {
  return {
    keys: entries.map(([k]) => k),
    values: entries.map(([, v]) => v),
  };
}
