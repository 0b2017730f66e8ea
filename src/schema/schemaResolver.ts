import { ConfigurationError } from '../errors';
import { asNullable, fieldIndex, withoutField } from '../types/schema';
import type { StructType } from '../types/schema';

export interface ResolvedSchemas {
  /** Declared schema with every field nullable */
  nullableSchema: StructType;
  /** What the raw parser reads: the nullable schema without the corrupt column */
  actualSchema: StructType;
  /** Output shape; may include the corrupt column */
  requiredSchema: StructType;
  /** Position of the corrupt column in `requiredSchema` */
  corruptFieldIndex?: number;
}

export interface ResolveOptions {
  /** Pruned projection of the declared schema */
  required?: StructType;
  /** The corrupt column was named in the options rather than defaulted */
  explicit?: boolean;
}

function assertUniqueFieldNames(schema: StructType): void {
  const seen = new Set<string>();
  for (const { name } of schema.fields) {
    if (seen.has(name)) {
      throw new ConfigurationError('INVALID_SCHEMA', `Found duplicate field name "${name}" in the schema.`, {
        fieldName: name,
      });
    }
    seen.add(name);
  }
}

/**
 * Derives the schemas a decoder works with and validates the corrupt-record column.
 * Pure: the same inputs always give equal results.
 */
export function resolveSchemas(
  declared: StructType,
  corruptName: string,
  { required, explicit = false }: ResolveOptions = {},
): ResolvedSchemas {
  assertUniqueFieldNames(declared);
  if (required) assertUniqueFieldNames(required);

  const declaredIndex = fieldIndex(declared, corruptName);
  const corruptField = declaredIndex === undefined ? undefined : declared.fields[declaredIndex];

  if (corruptField) {
    const type = corruptField.dataType;
    if (type.kind !== 'string' || !corruptField.nullable) {
      throw ConfigurationError.invalidCorruptRecordType(corruptName);
    }
  } else if (explicit) {
    throw ConfigurationError.corruptRecordColumnNotFound(corruptName);
  }

  const nullableSchema = asNullable(declared);
  const actualSchema = withoutField(nullableSchema, corruptField ? corruptName : undefined);
  const requiredSchema = required ? asNullable(required) : nullableSchema;

  return {
    nullableSchema,
    actualSchema,
    requiredSchema,
    corruptFieldIndex: corruptField ? fieldIndex(requiredSchema, corruptName) : undefined,
  };
}
