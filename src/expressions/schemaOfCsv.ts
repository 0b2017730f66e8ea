import { defaultSessionConf } from '../config/codecConfig';
import type { SessionConf } from '../config/codecConfig';
import { CsvOptions } from '../config/csvOptions';
import { InternalError } from '../errors';
import { SchemaOfCsvEvaluator } from '../schema/schemaInference';
import type { Row, Value } from '../types/record';
import { StringType } from '../types/schema';
import type { DataType } from '../types/schema';
import { quotedType, TYPE_CHECK_SUCCESS } from './expression';
import type { Expression, TypeChecked, TypeCheckResult } from './expression';
import { LazySlot } from './lazySlot';

export interface SchemaOfCsvArgs {
  child: Expression;
  options: Readonly<Record<string, string>>;
}

/**
 * `schema_of_csv(csv[, options])`: the schema of a constant CSV sample, as DDL text.
 */
export class SchemaOfCsv implements Expression, TypeChecked {
  readonly prettyName = 'schema_of_csv';
  readonly dataType: DataType = StringType;
  readonly nullable = false;
  readonly child: Expression;
  readonly options: Readonly<Record<string, string>>;
  /** Resolved once when the expression is built */
  readonly parsedOptions: CsvOptions;

  private readonly evaluator: LazySlot<SchemaOfCsvEvaluator>;

  constructor(args: SchemaOfCsvArgs, session: SessionConf = defaultSessionConf) {
    this.child = args.child;
    this.options = args.options;
    const parsedOptions = new CsvOptions(this.options, {
      columnPruning: false,
      defaultTimeZoneId: session.sessionTimeZone,
      defaultColumnNameOfCorruptRecord: session.columnNameOfCorruptRecord,
    });
    this.parsedOptions = parsedOptions;
    this.evaluator = new LazySlot(() => new SchemaOfCsvEvaluator(parsedOptions));
  }

  get foldable(): boolean {
    return this.child.foldable;
  }

  get children(): readonly Expression[] {
    return [this.child];
  }

  checkInputDataTypes(): TypeCheckResult {
    if (!this.child.foldable) {
      return {
        success: false,
        errorSubClass: 'NON_FOLDABLE_INPUT',
        messageParameters: {
          inputName: '`csv`',
          inputType: '"STRING"',
          inputExpr: `"${this.child.sql()}"`,
        },
      };
    }
    if (this.child.eval() === null) {
      return {
        success: false,
        errorSubClass: 'UNEXPECTED_NULL',
        messageParameters: { exprName: '`csv`' },
      };
    }
    if (this.child.dataType.kind !== 'string') {
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
    return TYPE_CHECK_SUCCESS;
  }

  eval(input?: Row): Value {
    const sample = this.child.eval(input);
    if (typeof sample !== 'string') {
      throw new InternalError('schema_of_csv expects a non-null string sample.');
    }
    return this.evaluator.get().evaluate(sample);
  }

  sql(): string {
    return `${this.prettyName}(${this.child.sql()})`;
  }
}
