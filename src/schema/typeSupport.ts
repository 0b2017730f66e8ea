import type { DataType } from '../types/schema';

/**
 * Whether `to_csv` can render values of this type. Variants never are; containers are
 * when everything inside them is.
 */
export function isSupportedDataType(dataType: DataType): boolean {
  switch (dataType.kind) {
    case 'variant':
      return false;
    case 'array':
      return isSupportedDataType(dataType.elementType);
    case 'map':
      return isSupportedDataType(dataType.keyType) && isSupportedDataType(dataType.valueType);
    case 'struct':
      return dataType.fields.every((f) => isSupportedDataType(f.dataType));
    case 'udt':
      return isSupportedDataType(dataType.sqlType);
    default:
      return true;
  }
}

/**
 * Whether a CSV token can be read as this type: atomic types, and user-defined types
 * over them.
 */
export function isDecodableDataType(dataType: DataType): boolean {
  switch (dataType.kind) {
    case 'variant':
    case 'array':
    case 'map':
    case 'struct':
      return false;
    case 'udt':
      return isDecodableDataType(dataType.sqlType);
    default:
      return true;
  }
}
