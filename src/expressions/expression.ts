/**
 * Minimal expression framework the CSV functions plug into.
 */

import { DataTypeMismatchError } from '../errors';
import type { DataTypeMismatchSubClass } from '../errors';
import { typeToSQL } from '../parsers/schemaDDL';
import { isMapData, isValueArray } from '../types/record';
import type { Row, Value } from '../types/record';
import type { DataType, StructType } from '../types/schema';

export interface Expression {
  readonly dataType: DataType;
  readonly nullable: boolean;
  /** True when the value can be computed without an input row */
  readonly foldable: boolean;
  readonly children: readonly Expression[];
  readonly prettyName: string;
  eval(input?: Row): Value;
  sql(): string;
}

export type TypeCheckResult =
  | { success: true }
  | {
      success: false;
      errorSubClass: DataTypeMismatchSubClass;
      messageParameters: Record<string, string>;
    };

export const TYPE_CHECK_SUCCESS: TypeCheckResult = { success: true };

/** Expressions that validate their arguments before evaluation */
export interface TypeChecked {
  checkInputDataTypes(): TypeCheckResult;
}

/** Expressions whose output depends on a time zone */
export interface TimeZoneAware {
  readonly timeZoneId?: string;
  withTimeZone(timeZoneId: string): Expression & TimeZoneAware;
}

/** Expressions decoding into a declared schema that a planner may prune */
export interface SchemaBound {
  readonly schema: StructType;
  readonly requiredSchema?: StructType;
  withRequiredSchema(requiredSchema: StructType): Expression & SchemaBound;
}

export type CompiledExpression = (input?: Row) => Value;

/** Expressions that can produce a specialised evaluator */
export interface CodeGenerable {
  genCode(): CompiledExpression;
}

export function isTypeChecked(expr: Expression): expr is Expression & TypeChecked {
  return 'checkInputDataTypes' in expr && typeof expr.checkInputDataTypes === 'function';
}

export function isCodeGenerable(expr: Expression): expr is Expression & CodeGenerable {
  return 'genCode' in expr && typeof expr.genCode === 'function';
}

/**
 * Compiles an expression tree to a closure; expressions without code generation fall
 * back to `eval`.
 */
export function compile(expr: Expression): CompiledExpression {
  if (isCodeGenerable(expr)) return expr.genCode();
  return (input) => expr.eval(input);
}

/**
 * Throws the failed type check of an expression.
 */
export function assertTypeCheck<T extends Expression>(expr: T): T {
  if (!isTypeChecked(expr)) return expr;
  const result = expr.checkInputDataTypes();
  if (!result.success) {
    throw new DataTypeMismatchError(`"${expr.sql()}"`, result.errorSubClass, result.messageParameters);
  }
  return expr;
}

export function quotedType(dataType: DataType): string {
  return `"${typeToSQL(dataType)}"`;
}

function valueToSQL(value: Value): string {
  if (value === null) return 'NULL';
  if (typeof value === 'string') return `'${value.replace(/'/g, "\\'")}'`;
  if (typeof value === 'bigint') return `${value}L`;
  if (value instanceof Date) return `TIMESTAMP '${value.toISOString()}'`;
  if (value instanceof Uint8Array) return `X'${Buffer.from(value).toString('hex').toUpperCase()}'`;
  if (isValueArray(value)) return `array(${value.map(valueToSQL).join(', ')})`;
  if (isMapData(value)) {
    const args = value.keys.flatMap((k, i) => [valueToSQL(k), valueToSQL(value.values[i] ?? null)]);
    return `map(${args.join(', ')})`;
  }
  return String(value);
}

/**
 * A constant.
 */
export class Literal implements Expression {
  readonly foldable = true;
  readonly children: readonly Expression[] = [];
  readonly prettyName = 'literal';

  constructor(
    readonly value: Value,
    readonly dataType: DataType,
  ) {}

  get nullable(): boolean {
    return this.value === null;
  }

  eval(): Value {
    return this.value;
  }

  sql(): string {
    return valueToSQL(this.value);
  }
}

/**
 * Reads one column of the input row.
 */
export class BoundReference implements Expression {
  readonly foldable = false;
  readonly children: readonly Expression[] = [];
  readonly prettyName = 'boundreference';

  constructor(
    readonly ordinal: number,
    readonly dataType: DataType,
    readonly nullable = true,
    readonly name?: string,
  ) {}

  eval(input?: Row): Value {
    return input?.[this.ordinal] ?? null;
  }

  sql(): string {
    return this.name ?? `input[${this.ordinal}]`;
  }
}
