import { CsvCodecError } from './base';

export type DataTypeMismatchSubClass =
  | 'NON_FOLDABLE_INPUT'
  | 'UNEXPECTED_NULL'
  | 'UNSUPPORTED_INPUT_TYPE'
  | 'UNEXPECTED_INPUT_TYPE';

/**
 * The arguments of an expression have the wrong shape. Raised while binding, before
 * any row is evaluated.
 */
export class DataTypeMismatchError extends CsvCodecError {
  readonly subClass: DataTypeMismatchSubClass;
  readonly sqlExpr: string;

  constructor(
    sqlExpr: string,
    subClass: DataTypeMismatchSubClass,
    messageParameters: Record<string, string>,
  ) {
    super(
      `DATATYPE_MISMATCH.${subClass}`,
      `Cannot resolve ${sqlExpr} due to data type mismatch: ${describeMismatch(subClass, messageParameters)}`,
      messageParameters,
    );
    this.name = 'DataTypeMismatchError';
    this.subClass = subClass;
    this.sqlExpr = sqlExpr;
  }
}

function describeMismatch(
  subClass: DataTypeMismatchSubClass,
  params: Record<string, string>,
): string {
  switch (subClass) {
    case 'NON_FOLDABLE_INPUT':
      return `the input ${params.inputName} should be a foldable ${params.inputType} expression; however, got ${params.inputExpr}.`;
    case 'UNEXPECTED_NULL':
      return `the ${params.exprName} must not be null.`;
    case 'UNSUPPORTED_INPUT_TYPE':
      return `the input of ${params.functionName} can't be ${params.dataType} type data.`;
    case 'UNEXPECTED_INPUT_TYPE':
      return `the ${params.paramIndex} parameter requires the ${params.requiredType} type, however ${params.inputSql} has the type ${params.inputType}.`;
  }
}
