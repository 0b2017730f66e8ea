/**
 * Schema DDL: `a INT, b DOUBLE` and `STRUCT<a: INT, b: ARRAY<STRING>>` in both
 * directions.
 */

import { ConfigurationError } from '../errors';
import {
  arrayType,
  BinaryType,
  BooleanType,
  ByteType,
  DateType,
  decimalType,
  DoubleType,
  FloatType,
  IntegerType,
  LongType,
  mapType,
  MAX_DECIMAL_PRECISION,
  NullType,
  ShortType,
  StringType,
  structField,
  structType,
  TimestampNTZType,
  TimestampType,
  VariantType,
} from '../types/schema';
import type { DataType, StructField, StructType } from '../types/schema';

type SymbolText = '<' | '>' | '(' | ')' | ',' | ':';

type Token =
  | { kind: 'ident'; text: string; quoted: boolean; pos: number }
  | { kind: 'number'; text: string; pos: number }
  | { kind: 'string'; text: string; pos: number }
  | { kind: 'symbol'; text: SymbolText; pos: number }
  | { kind: 'end'; pos: number };

const SYMBOLS: readonly SymbolText[] = ['<', '>', '(', ')', ',', ':'];

function asSymbol(ch: string): SymbolText | undefined {
  return SYMBOLS.find((s) => s === ch);
}

const SIMPLE_TYPES: Record<string, DataType> = {
  VOID: NullType,
  BOOLEAN: BooleanType,
  TINYINT: ByteType,
  BYTE: ByteType,
  SMALLINT: ShortType,
  SHORT: ShortType,
  INT: IntegerType,
  INTEGER: IntegerType,
  BIGINT: LongType,
  LONG: LongType,
  FLOAT: FloatType,
  REAL: FloatType,
  DOUBLE: DoubleType,
  STRING: StringType,
  BINARY: BinaryType,
  DATE: DateType,
  TIMESTAMP: TimestampType,
  TIMESTAMP_LTZ: TimestampType,
  TIMESTAMP_NTZ: TimestampNTZType,
  VARIANT: VariantType,
};

const DECIMAL_NAMES = new Set(['DECIMAL', 'DEC', 'NUMERIC']);
const SIMPLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

function invalidSchema(ddl: string, message: string, pos: number): ConfigurationError {
  return new ConfigurationError(
    'INVALID_SCHEMA',
    `Cannot parse the schema ${JSON.stringify(ddl)}: ${message} (position ${pos}).`,
    { inputSchema: ddl, reason: message },
  );
}

function tokenize(ddl: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < ddl.length) {
    const ch = ddl.charAt(i);
    const symbol = asSymbol(ch);
    if (/\s/.test(ch)) {
      i += 1;
    } else if (symbol) {
      tokens.push({ kind: 'symbol', text: symbol, pos: i });
      i += 1;
    } else if (ch === '`') {
      let text = '';
      let j = i + 1;
      while (true) {
        if (j >= ddl.length) throw invalidSchema(ddl, 'unterminated quoted identifier', i);
        if (ddl.charAt(j) === '`') {
          if (ddl.charAt(j + 1) === '`') {
            text += '`';
            j += 2;
            continue;
          }
          break;
        }
        text += ddl.charAt(j);
        j += 1;
      }
      tokens.push({ kind: 'ident', text, quoted: true, pos: i });
      i = j + 1;
    } else if (ch === "'" || ch === '"') {
      const end = ddl.indexOf(ch, i + 1);
      if (end === -1) throw invalidSchema(ddl, 'unterminated string literal', i);
      tokens.push({ kind: 'string', text: ddl.slice(i + 1, end), pos: i });
      i = end + 1;
    } else if (/\d/.test(ch)) {
      let j = i;
      while (j < ddl.length && /\d/.test(ddl.charAt(j))) j += 1;
      tokens.push({ kind: 'number', text: ddl.slice(i, j), pos: i });
      i = j;
    } else if (/[A-Za-z_]/.test(ch)) {
      let j = i;
      while (j < ddl.length && /[A-Za-z0-9_]/.test(ddl.charAt(j))) j += 1;
      tokens.push({ kind: 'ident', text: ddl.slice(i, j), quoted: false, pos: i });
      i = j;
    } else {
      throw invalidSchema(ddl, `unexpected character '${ch}'`, i);
    }
  }
  tokens.push({ kind: 'end', pos: ddl.length });
  return tokens;
}

class DDLParser {
  private index = 0;

  constructor(
    private readonly ddl: string,
    private readonly tokens: Token[],
  ) {}

  private peek(): Token {
    return this.tokens[this.index] ?? { kind: 'end', pos: this.ddl.length };
  }

  private next(): Token {
    const token = this.peek();
    if (token.kind !== 'end') this.index += 1;
    return token;
  }

  private isSymbol(text: string): boolean {
    const token = this.peek();
    return token.kind === 'symbol' && token.text === text;
  }

  private isKeyword(word: string): boolean {
    const token = this.peek();
    return token.kind === 'ident' && !token.quoted && token.text.toUpperCase() === word;
  }

  private expectSymbol(text: string): void {
    const token = this.next();
    if (token.kind !== 'symbol' || token.text !== text) {
      throw invalidSchema(this.ddl, `expected '${text}'`, token.pos);
    }
  }

  private expectNumber(): number {
    const token = this.next();
    if (token.kind !== 'number') throw invalidSchema(this.ddl, 'expected a number', token.pos);
    return Number.parseInt(token.text, 10);
  }

  expectEnd(): void {
    const token = this.peek();
    if (token.kind !== 'end') throw invalidSchema(this.ddl, 'unexpected trailing input', token.pos);
  }

  atEnd(): boolean {
    return this.peek().kind === 'end';
  }

  /** `field (, field)*` where a field is `name [:] type [NOT NULL] [COMMENT '...']` */
  parseFieldList(terminator?: '>'): StructField[] {
    const fields: StructField[] = [];
    if (terminator && this.isSymbol(terminator)) return fields;
    while (true) {
      fields.push(this.parseField());
      if (!this.isSymbol(',')) break;
      this.next();
    }
    return fields;
  }

  private parseField(): StructField {
    const name = this.next();
    if (name.kind !== 'ident') throw invalidSchema(this.ddl, 'expected a field name', name.pos);
    if (this.isSymbol(':')) this.next();
    const dataType = this.parseType();
    let nullable = true;
    if (this.isKeyword('NOT')) {
      this.next();
      if (!this.isKeyword('NULL')) throw invalidSchema(this.ddl, "expected 'NULL'", this.peek().pos);
      this.next();
      nullable = false;
    }
    if (this.isKeyword('COMMENT')) {
      this.next();
      const comment = this.next();
      if (comment.kind !== 'string') throw invalidSchema(this.ddl, 'expected a comment string', comment.pos);
    }
    return structField(name.text, dataType, nullable);
  }

  parseType(): DataType {
    const token = this.next();
    if (token.kind !== 'ident' || token.quoted) {
      throw invalidSchema(this.ddl, 'expected a data type', token.pos);
    }
    const name = token.text.toUpperCase();

    if (DECIMAL_NAMES.has(name)) {
      if (!this.isSymbol('(')) return decimalType();
      this.next();
      const precision = this.expectNumber();
      let scale = 0;
      if (this.isSymbol(',')) {
        this.next();
        scale = this.expectNumber();
      }
      this.expectSymbol(')');
      if (precision < 1 || precision > MAX_DECIMAL_PRECISION || scale > precision) {
        throw invalidSchema(this.ddl, `invalid decimal precision/scale (${precision}, ${scale})`, token.pos);
      }
      return decimalType(precision, scale);
    }

    if (name === 'VARCHAR' || name === 'CHAR') {
      this.expectSymbol('(');
      this.expectNumber();
      this.expectSymbol(')');
      return StringType;
    }

    if (name === 'ARRAY') {
      this.expectSymbol('<');
      const elementType = this.parseType();
      this.expectSymbol('>');
      return arrayType(elementType);
    }

    if (name === 'MAP') {
      this.expectSymbol('<');
      const keyType = this.parseType();
      this.expectSymbol(',');
      const valueType = this.parseType();
      this.expectSymbol('>');
      return mapType(keyType, valueType);
    }

    if (name === 'STRUCT') {
      this.expectSymbol('<');
      const fields = this.parseFieldList('>');
      this.expectSymbol('>');
      return structType(fields);
    }

    const simple = SIMPLE_TYPES[name];
    if (!simple) throw invalidSchema(this.ddl, `unsupported data type '${token.text}'`, token.pos);
    return simple;
  }
}

/**
 * Parses a schema given either as a field list (`a INT, b STRING NOT NULL`) or as a
 * struct type (`STRUCT<a: INT, b: STRING>`).
 */
export function parseSchemaDDL(ddl: string): StructType {
  const tokens = tokenize(ddl);
  const first = tokens[0];
  const second = tokens[1];
  const parser = new DDLParser(ddl, tokens);
  if (parser.atEnd()) return structType([]);

  if (
    first?.kind === 'ident' &&
    !first.quoted &&
    first.text.toUpperCase() === 'STRUCT' &&
    second?.kind === 'symbol' &&
    second.text === '<'
  ) {
    const dataType = parser.parseType();
    parser.expectEnd();
    if (dataType.kind !== 'struct') throw invalidSchema(ddl, 'expected a struct type', 0);
    return dataType;
  }

  const fields = parser.parseFieldList();
  parser.expectEnd();
  return structType(fields);
}

/**
 * Parses a single data type, e.g. `ARRAY<DECIMAL(10,2)>`.
 */
export function parseDataType(ddl: string): DataType {
  const parser = new DDLParser(ddl, tokenize(ddl));
  const dataType = parser.parseType();
  parser.expectEnd();
  return dataType;
}

export function quoteIfNeeded(name: string): string {
  return SIMPLE_NAME.test(name) ? name : `\`${name.replace(/`/g, '``')}\``;
}

/**
 * SQL text of a type, e.g. `STRUCT<_c0: INT, _c1: STRING>`.
 */
export function typeToSQL(dataType: DataType): string {
  switch (dataType.kind) {
    case 'null':
      return 'VOID';
    case 'boolean':
      return 'BOOLEAN';
    case 'byte':
      return 'TINYINT';
    case 'short':
      return 'SMALLINT';
    case 'integer':
      return 'INT';
    case 'long':
      return 'BIGINT';
    case 'float':
      return 'FLOAT';
    case 'double':
      return 'DOUBLE';
    case 'decimal':
      return `DECIMAL(${dataType.precision},${dataType.scale})`;
    case 'string':
      return 'STRING';
    case 'binary':
      return 'BINARY';
    case 'date':
      return 'DATE';
    case 'timestamp':
      return 'TIMESTAMP';
    case 'timestamp_ntz':
      return 'TIMESTAMP_NTZ';
    case 'variant':
      return 'VARIANT';
    case 'array':
      return `ARRAY<${typeToSQL(dataType.elementType)}>`;
    case 'map':
      return `MAP<${typeToSQL(dataType.keyType)}, ${typeToSQL(dataType.valueType)}>`;
    case 'struct':
      return `STRUCT<${dataType.fields
        .map((f) => `${quoteIfNeeded(f.name)}: ${typeToSQL(f.dataType)}${f.nullable ? '' : ' NOT NULL'}`)
        .join(', ')}>`;
    case 'udt':
      return typeToSQL(dataType.sqlType);
  }
}

/**
 * Field-list DDL of a schema, e.g. `a INT, b DOUBLE NOT NULL`.
 */
export function schemaToDDL(schema: StructType): string {
  return schema.fields
    .map((f) => `${quoteIfNeeded(f.name)} ${typeToSQL(f.dataType)}${f.nullable ? '' : ' NOT NULL'}`)
    .join(', ');
}
