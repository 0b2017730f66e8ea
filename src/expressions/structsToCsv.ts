import { defaultSessionConf } from '../config/codecConfig';
import type { SessionConf } from '../config/codecConfig';
import { CsvOptions } from '../config/csvOptions';
import { InternalError } from '../errors';
import { isSupportedDataType } from '../schema/typeSupport';
import { isValueArray } from '../types/record';
import type { Row, Value } from '../types/record';
import { StringType } from '../types/schema';
import type { DataType } from '../types/schema';
import { CsvRecordWriter } from '../writers/csvRecordWriter';
import { compile, quotedType, TYPE_CHECK_SUCCESS } from './expression';
import type {
  CodeGenerable,
  CompiledExpression,
  Expression,
  TimeZoneAware,
  TypeChecked,
  TypeCheckResult,
} from './expression';
import { LazySlot } from './lazySlot';

export interface StructsToCsvArgs {
  options: Readonly<Record<string, string>>;
  child: Expression;
  timeZoneId?: string;
}

/**
 * `to_csv(struct[, options])`: renders a struct as one CSV record.
 *
 * Options and the time zone are checked when the expression is built; the writer is
 * built on first use.
 */
export class StructsToCsv implements Expression, TimeZoneAware, TypeChecked, CodeGenerable {
  readonly prettyName = 'to_csv';
  readonly dataType: DataType = StringType;
  readonly nullable = true;
  readonly options: Readonly<Record<string, string>>;
  readonly child: Expression;
  readonly timeZoneId?: string;

  private readonly writer: LazySlot<CsvRecordWriter>;

  constructor(
    args: StructsToCsvArgs,
    private readonly session: SessionConf = defaultSessionConf,
  ) {
    this.options = args.options;
    this.child = args.child;
    this.timeZoneId = args.timeZoneId;

    const options = new CsvOptions(this.options, {
      columnPruning: true,
      defaultTimeZoneId: this.timeZoneId ?? session.sessionTimeZone,
      defaultColumnNameOfCorruptRecord: session.columnNameOfCorruptRecord,
    });
    const clock = options.createZoneClock();
    this.writer = new LazySlot(() => {
      const inputType = this.child.dataType;
      if (inputType.kind !== 'struct') {
        throw new InternalError(`to_csv expects a struct input, got ${quotedType(inputType)}.`);
      }
      return new CsvRecordWriter(inputType, options, clock);
    });
  }

  get foldable(): boolean {
    return this.child.foldable;
  }

  get children(): readonly Expression[] {
    return [this.child];
  }

  checkInputDataTypes(): TypeCheckResult {
    const inputType = this.child.dataType;
    if (inputType.kind === 'struct' && isSupportedDataType(inputType)) return TYPE_CHECK_SUCCESS;
    return {
      success: false,
      errorSubClass: 'UNSUPPORTED_INPUT_TYPE',
      messageParameters: {
        functionName: this.prettyName,
        dataType: quotedType(inputType),
      },
    };
  }

  encode(row: Row): string {
    return this.writer.get().write(row);
  }

  eval(input?: Row): Value {
    return this.encodeValue(this.child.eval(input));
  }

  /**
   * Same contract as `eval`, with the child compiled.
   */
  genCode(): CompiledExpression {
    const child = compile(this.child);
    return (input) => this.encodeValue(child(input));
  }

  withTimeZone(timeZoneId: string): StructsToCsv {
    return new StructsToCsv(
      { options: this.options, child: this.child, timeZoneId },
      this.session,
    );
  }

  sql(): string {
    return `${this.prettyName}(${this.child.sql()})`;
  }

  private encodeValue(value: Value): Value {
    if (value === null) return null;
    if (!isValueArray(value)) {
      throw new InternalError('to_csv expects a struct value.');
    }
    return this.encode(value);
  }
}
