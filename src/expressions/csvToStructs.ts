import { defaultSessionConf } from '../config/codecConfig';
import type { SessionConf } from '../config/codecConfig';
import { CsvOptions, SINGLE_RECORD_LINE_SEP } from '../config/csvOptions';
import { ConfigurationError, InternalError } from '../errors';
import { CsvRecordParser } from '../parsers/csvRecordParser';
import { FailureSafeParser } from '../parsers/failureSafeParser';
import { schemaToDDL, typeToSQL } from '../parsers/schemaDDL';
import { resolveSchemas } from '../schema/schemaResolver';
import type { ResolvedSchemas } from '../schema/schemaResolver';
import { isDecodableDataType } from '../schema/typeSupport';
import type { ParseMode } from '../types/csv';
import type { Row, Value } from '../types/record';
import { withoutField } from '../types/schema';
import type { StructType } from '../types/schema';
import { quotedType, TYPE_CHECK_SUCCESS } from './expression';
import type { Expression, SchemaBound, TimeZoneAware, TypeChecked, TypeCheckResult } from './expression';
import { LazySlot } from './lazySlot';

export interface CsvToStructsArgs {
  schema: StructType;
  options: Readonly<Record<string, string>>;
  child: Expression;
  timeZoneId?: string;
  /** Pruned output shape; defaults to the whole schema */
  requiredSchema?: StructType;
}

/**
 * `from_csv(csvStr, schema[, options])`: decodes one CSV record into a struct.
 *
 * Options, mode and schemas are resolved when the expression is built; the record
 * parser is built on first use and reused for every row.
 */
export class CsvToStructs implements Expression, TimeZoneAware, SchemaBound, TypeChecked {
  readonly prettyName = 'from_csv';
  readonly schema: StructType;
  readonly requiredSchema?: StructType;
  readonly options: Readonly<Record<string, string>>;
  readonly child: Expression;
  readonly timeZoneId?: string;
  readonly parseMode: ParseMode;
  readonly resolved: ResolvedSchemas;

  private readonly parser: LazySlot<FailureSafeParser>;

  constructor(
    args: CsvToStructsArgs,
    private readonly session: SessionConf = defaultSessionConf,
  ) {
    this.schema = args.schema;
    this.requiredSchema = args.requiredSchema;
    this.options = args.options;
    this.child = args.child;
    this.timeZoneId = args.timeZoneId;

    const parsedOptions = CsvOptions.withOverrides(
      args.options,
      { lineSep: SINGLE_RECORD_LINE_SEP },
      {
        columnPruning: true,
        defaultTimeZoneId: args.timeZoneId ?? session.sessionTimeZone,
        defaultColumnNameOfCorruptRecord: session.columnNameOfCorruptRecord,
      },
    );

    if (parsedOptions.parseMode !== 'PERMISSIVE' && parsedOptions.parseMode !== 'FAILFAST') {
      throw ConfigurationError.unsupportedParseMode(this.prettyName, parsedOptions.parseMode);
    }
    this.parseMode = parsedOptions.parseMode;

    const corruptColumn = parsedOptions.columnNameOfCorruptRecord;
    this.resolved = resolveSchemas(args.schema, corruptColumn, {
      required: args.requiredSchema,
      explicit: parsedOptions.corruptRecordColumnExplicit,
    });

    for (const field of this.resolved.actualSchema.fields) {
      if (!isDecodableDataType(field.dataType)) {
        throw new ConfigurationError(
          'UNSUPPORTED_DATA_TYPE',
          `CSV data source does not support ${typeToSQL(field.dataType)} data type.`,
          { columnName: field.name, dataType: typeToSQL(field.dataType) },
        );
      }
    }

    const { actualSchema, requiredSchema, corruptFieldIndex } = this.resolved;
    const outputCorrupt = corruptFieldIndex === undefined ? undefined : corruptColumn;
    const parsedSchema = withoutField(requiredSchema, outputCorrupt);

    if (session.verbose) {
      console.log(
        `[Codec] from_csv bound: schema=${schemaToDDL(actualSchema)}, mode=${this.parseMode}, ` +
          `corrupt=${outputCorrupt ?? 'none'}`,
      );
    }

    const clock = parsedOptions.createZoneClock();
    this.parser = new LazySlot(
      () =>
        new FailureSafeParser(
          new CsvRecordParser(actualSchema, parsedSchema, parsedOptions, clock),
          this.parseMode,
          requiredSchema,
          outputCorrupt,
          parsedSchema,
          session.verbose,
        ),
    );
  }

  get dataType(): StructType {
    return this.resolved.requiredSchema;
  }

  get nullable(): boolean {
    return this.child.nullable;
  }

  get foldable(): boolean {
    return this.child.foldable;
  }

  get children(): readonly Expression[] {
    return [this.child];
  }

  checkInputDataTypes(): TypeCheckResult {
    const kind = this.child.dataType.kind;
    if (kind === 'string' || kind === 'null') return TYPE_CHECK_SUCCESS;
    return {
      success: false,
      errorSubClass: 'UNEXPECTED_INPUT_TYPE',
      messageParameters: {
        paramIndex: 'first',
        requiredType: '"STRING"',
        inputSql: `"${this.child.sql()}"`,
        inputType: quotedType(this.child.dataType),
      },
    };
  }

  /**
   * Decodes one record. Malformed records follow the parse mode.
   */
  decode(text: string): Row {
    return this.parser.get().parse(text);
  }

  eval(input?: Row): Value {
    const value = this.child.eval(input);
    if (value === null) return null;
    if (typeof value !== 'string') {
      throw new InternalError(`from_csv expects a string input, got ${typeof value}.`);
    }
    return this.decode(value);
  }

  withTimeZone(timeZoneId: string): CsvToStructs {
    return new CsvToStructs({ ...this.args(), timeZoneId }, this.session);
  }

  withRequiredSchema(requiredSchema: StructType): CsvToStructs {
    return new CsvToStructs({ ...this.args(), requiredSchema }, this.session);
  }

  sql(): string {
    return `${this.prettyName}(${this.child.sql()})`;
  }

  private args(): CsvToStructsArgs {
    return {
      schema: this.schema,
      options: this.options,
      child: this.child,
      timeZoneId: this.timeZoneId,
      requiredSchema: this.requiredSchema,
    };
  }
}
