import type { SessionConf } from '../config/codecConfig';
import { BoundReference, compile, Literal } from '../expressions/expression';
import type { CompiledExpression } from '../expressions/expression';
import type { CsvToStructs } from '../expressions/csvToStructs';
import { fromCsv, schemaOfCsv, toCsv } from '../expressions/functionRegistry';
import { parseSchemaDDL } from '../parsers/schemaDDL';
import { isValueArray, mapData } from '../types/record';
import { mapType, StringType } from '../types/schema';
import type { StructType } from '../types/schema';
import { jsonToRow, rowToJson } from './jsonValues';
import type { JsonValue } from './jsonValues';

export interface CallSettings {
  options: Record<string, string>;
  timeZone?: string;
}

function optionsLiteral(options: Record<string, string>): Literal {
  return new Literal(mapData(Object.entries(options)), mapType(StringType, StringType));
}

/**
 * Binds `from_csv(value, schema, options)` over a one-column input row.
 */
export function bindFromCsv(schemaDDL: string, settings: CallSettings, session: SessionConf): CsvToStructs {
  const expr = fromCsv(
    new BoundReference(0, StringType, true, 'value'),
    new Literal(schemaDDL, StringType),
    optionsLiteral(settings.options),
    session,
  );
  return settings.timeZone === undefined ? expr : expr.withTimeZone(settings.timeZone);
}

/**
 * A record decoder returning JSON rows; null input gives null.
 */
export function fromCsvDecoder(
  schemaDDL: string,
  settings: CallSettings,
  session: SessionConf,
): { schema: StructType; decode: (value: string | null) => JsonValue } {
  const expr = bindFromCsv(schemaDDL, settings, session);
  const schema = expr.dataType;
  return {
    schema,
    decode: (value) => {
      const row = expr.eval([value]);
      return isValueArray(row) ? rowToJson(row, schema) : null;
    },
  };
}

/**
 * A row encoder over JSON rows of the given struct DDL.
 */
export function toCsvEncoder(
  schemaDDL: string,
  settings: CallSettings,
  session: SessionConf,
): (json: unknown, path: string) => string | null {
  const schema = parseSchemaDDL(schemaDDL);
  const bound = toCsv(new BoundReference(0, schema, true, 'value'), optionsLiteral(settings.options), session);
  const expr = settings.timeZone === undefined ? bound : bound.withTimeZone(settings.timeZone);
  const encode: CompiledExpression = compile(expr);
  return (json, path) => {
    const row = json === null ? null : jsonToRow(json, schema, path);
    const text = encode([row]);
    return typeof text === 'string' ? text : null;
  };
}

export function inferSchema(sample: string | null, options: Record<string, string>, session: SessionConf): string {
  const expr = schemaOfCsv(new Literal(sample, StringType), optionsLiteral(options), session);
  return String(expr.eval());
}
