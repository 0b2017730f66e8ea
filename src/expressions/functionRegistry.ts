import { defaultSessionConf } from '../config/codecConfig';
import type { SessionConf } from '../config/codecConfig';
import { ConfigurationError } from '../errors';
import { parseSchemaDDL } from '../parsers/schemaDDL';
import { isMapData } from '../types/record';
import type { StructType } from '../types/schema';
import { CsvToStructs } from './csvToStructs';
import { assertTypeCheck } from './expression';
import type { Expression } from './expression';
import { SchemaOfCsv } from './schemaOfCsv';
import { StructsToCsv } from './structsToCsv';

export type CsvFunctionName = 'from_csv' | 'to_csv' | 'schema_of_csv';

/**
 * Evaluates the schema argument of `from_csv`: a constant DDL string.
 */
export function schemaFromExpression(expr: Expression): StructType {
  const value = expr.foldable ? expr.eval() : null;
  if (typeof value !== 'string') {
    throw new ConfigurationError(
      'INVALID_SCHEMA',
      `The schema should be a constant STRING, but got ${expr.sql()}.`,
      { inputSchema: expr.sql() },
    );
  }
  return parseSchemaDDL(value);
}

/**
 * Evaluates an options argument: a constant `map(string, string)`.
 */
export function optionsFromExpression(expr: Expression | undefined): Record<string, string> {
  if (expr === undefined) return {};
  const value = expr.foldable ? expr.eval() : null;
  if (value === null || !isMapData(value)) {
    throw ConfigurationError.invalidOption('options', expr.sql(), 'must be a constant map() expression');
  }
  const options: Record<string, string> = {};
  value.keys.forEach((key, i) => {
    const entry = value.values[i] ?? null;
    if (typeof key !== 'string' || typeof entry !== 'string') {
      throw ConfigurationError.invalidOption('options', expr.sql(), 'keys and values must be strings');
    }
    options[key] = entry;
  });
  return options;
}

export function fromCsv(
  child: Expression,
  schema: Expression,
  options?: Expression,
  session: SessionConf = defaultSessionConf,
): CsvToStructs {
  return assertTypeCheck(
    new CsvToStructs(
      { schema: schemaFromExpression(schema), options: optionsFromExpression(options), child },
      session,
    ),
  );
}

export function toCsv(
  child: Expression,
  options?: Expression,
  session: SessionConf = defaultSessionConf,
): StructsToCsv {
  return assertTypeCheck(new StructsToCsv({ options: optionsFromExpression(options), child }, session));
}

export function schemaOfCsv(
  child: Expression,
  options?: Expression,
  session: SessionConf = defaultSessionConf,
): SchemaOfCsv {
  return assertTypeCheck(new SchemaOfCsv({ child, options: optionsFromExpression(options) }, session));
}

function wrongNumArgs(name: string, expected: string, actual: number): ConfigurationError {
  return new ConfigurationError(
    'WRONG_NUM_ARGS',
    `The \`${name}\` requires ${expected} parameters but the actual number is ${actual}.`,
    { functionName: name, expectedNum: expected, actualNum: String(actual) },
  );
}

/**
 * Builds a CSV function call from its name and argument expressions.
 */
export function createFunction(
  name: string,
  args: readonly Expression[],
  session: SessionConf = defaultSessionConf,
): Expression {
  const [first, second, third] = args;
  switch (name.toLowerCase()) {
    case 'from_csv':
      if (!first || !second || args.length > 3) throw wrongNumArgs('from_csv', '[2, 3]', args.length);
      return fromCsv(first, second, third, session);
    case 'to_csv':
      if (!first || args.length > 2) throw wrongNumArgs('to_csv', '[1, 2]', args.length);
      return toCsv(first, second, session);
    case 'schema_of_csv':
      if (!first || args.length > 2) throw wrongNumArgs('schema_of_csv', '[1, 2]', args.length);
      return schemaOfCsv(first, second, session);
    default:
      throw new ConfigurationError('UNRESOLVED_ROUTINE', `Cannot resolve function \`${name}\`.`, {
        routineName: name,
      });
  }
}
