/**
 * SQL data types and struct schemas.
 *
 * A schema is a struct type: an ordered list of fields. Field order is significant
 * and is preserved from the declared schema through the row representation.
 */

export type AtomicType =
  | { readonly kind: 'null' }
  | { readonly kind: 'boolean' }
  | { readonly kind: 'byte' }
  | { readonly kind: 'short' }
  | { readonly kind: 'integer' }
  | { readonly kind: 'long' }
  | { readonly kind: 'float' }
  | { readonly kind: 'double' }
  | { readonly kind: 'decimal'; readonly precision: number; readonly scale: number }
  | { readonly kind: 'string' }
  | { readonly kind: 'binary' }
  | { readonly kind: 'date' }
  | { readonly kind: 'timestamp' }
  | { readonly kind: 'timestamp_ntz' };

export interface ArrayType {
  readonly kind: 'array';
  readonly elementType: DataType;
  readonly containsNull: boolean;
}

export interface MapType {
  readonly kind: 'map';
  readonly keyType: DataType;
  readonly valueType: DataType;
  readonly valueContainsNull: boolean;
}

export interface StructField {
  /** Field name, unique within its struct */
  readonly name: string;
  readonly dataType: DataType;
  readonly nullable: boolean;
}

export interface StructType {
  readonly kind: 'struct';
  readonly fields: readonly StructField[];
}

/** Open-ended semi-structured type; it has no CSV text form. */
export interface VariantDataType {
  readonly kind: 'variant';
}

/**
 * User-defined type. Values are carried in the physical representation
 * described by `sqlType`.
 */
export interface UserDefinedType {
  readonly kind: 'udt';
  readonly name: string;
  readonly sqlType: DataType;
}

export type DataType = AtomicType | ArrayType | MapType | StructType | VariantDataType | UserDefinedType;

export const NullType: DataType = { kind: 'null' };
export const BooleanType: DataType = { kind: 'boolean' };
export const ByteType: DataType = { kind: 'byte' };
export const ShortType: DataType = { kind: 'short' };
export const IntegerType: DataType = { kind: 'integer' };
export const LongType: DataType = { kind: 'long' };
export const FloatType: DataType = { kind: 'float' };
export const DoubleType: DataType = { kind: 'double' };
export const StringType: DataType = { kind: 'string' };
export const BinaryType: DataType = { kind: 'binary' };
export const DateType: DataType = { kind: 'date' };
export const TimestampType: DataType = { kind: 'timestamp' };
export const TimestampNTZType: DataType = { kind: 'timestamp_ntz' };
export const VariantType: DataType = { kind: 'variant' };

export const MAX_DECIMAL_PRECISION = 38;

export function decimalType(precision = 10, scale = 0): DataType {
  return { kind: 'decimal', precision, scale };
}

export function arrayType(elementType: DataType, containsNull = true): ArrayType {
  return { kind: 'array', elementType, containsNull };
}

export function mapType(keyType: DataType, valueType: DataType, valueContainsNull = true): MapType {
  return { kind: 'map', keyType, valueType, valueContainsNull };
}

export function structField(name: string, dataType: DataType, nullable = true): StructField {
  return { name, dataType, nullable };
}

export function structType(fields: readonly StructField[]): StructType {
  return { kind: 'struct', fields };
}

export function userDefinedType(name: string, sqlType: DataType): UserDefinedType {
  return { kind: 'udt', name, sqlType };
}

/**
 * Returns a copy of the type with every nested nullability flag forced to true.
 */
export function asNullable<T extends DataType>(dataType: T): T;
export function asNullable(dataType: DataType): DataType {
  switch (dataType.kind) {
    case 'struct':
      return structType(
        dataType.fields.map((f) => structField(f.name, asNullable(f.dataType), true)),
      );
    case 'array':
      return arrayType(asNullable(dataType.elementType), true);
    case 'map':
      return mapType(asNullable(dataType.keyType), asNullable(dataType.valueType), true);
    default:
      return dataType;
  }
}

export function fieldIndex(schema: StructType, name: string): number | undefined {
  const index = schema.fields.findIndex((f) => f.name === name);
  return index === -1 ? undefined : index;
}

export function withoutField(schema: StructType, name: string | undefined): StructType {
  if (name === undefined) return schema;
  return structType(schema.fields.filter((f) => f.name !== name));
}
