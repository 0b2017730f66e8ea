export { CsvCodecError } from './base';
export { BadRecordError } from './badRecordError';
export { ConfigurationError } from './configurationError';
export type { ConfigurationErrorClass } from './configurationError';
export { DataTypeMismatchError } from './dataTypeMismatchError';
export type { DataTypeMismatchSubClass } from './dataTypeMismatchError';
export { FieldParseError } from './fieldParseError';
export { InternalError } from './internalError';
export { MalformedRecordError } from './malformedRecordError';
export { InvalidInputError } from './invalidInputError';
