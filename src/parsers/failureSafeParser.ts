import { BadRecordError, InternalError, MalformedRecordError } from '../errors';
import type { ParseMode, RecordParser } from '../types/csv';
import type { Row, Value } from '../types/record';
import { fieldIndex } from '../types/schema';
import type { StructType } from '../types/schema';

/**
 * Wraps a raw record parser and applies the parse mode.
 *
 * The raw parser fills `parsedSchema`; results are projected by field name onto
 * `outputSchema`, whose corrupt-record column (if any) receives the record text when
 * the record is malformed.
 */
export class FailureSafeParser {
  /** For each output field, the position in the raw row or -1 */
  private readonly projection: number[];
  private readonly corruptIndex?: number;

  constructor(
    private readonly rawParser: RecordParser,
    private readonly mode: ParseMode,
    private readonly outputSchema: StructType,
    corruptColumn: string | undefined,
    parsedSchema: StructType,
    private readonly verbose = false,
  ) {
    this.corruptIndex = corruptColumn === undefined ? undefined : fieldIndex(outputSchema, corruptColumn);
    this.projection = outputSchema.fields.map((f, i) =>
      i === this.corruptIndex ? -1 : (fieldIndex(parsedSchema, f.name) ?? -1),
    );
  }

  /**
   * Decodes one record into a row of the output schema.
   * @throws MalformedRecordError under FAILFAST when the record is malformed
   */
  parse(text: string): Row {
    let rows: Row[];
    try {
      rows = this.rawParser.parse(text);
    } catch (err) {
      if (err instanceof BadRecordError) return this.recover(text, err.partialResult, err);
      throw err;
    }

    if (rows.length > 1) {
      throw new InternalError('Expected one row from CSV parser.');
    }
    const [row] = rows;
    if (row === undefined) {
      return this.recover(text, undefined, new Error('No record found'));
    }
    return this.project(row, null);
  }

  private recover(text: string, partial: Row | undefined, cause: unknown): Row {
    switch (this.mode) {
      case 'FAILFAST':
        throw new MalformedRecordError(text, cause);
      case 'PERMISSIVE':
      case 'DROPMALFORMED':
        if (this.verbose) {
          console.warn(
            `[Codec] Malformed record kept as corrupt: ${cause instanceof Error ? cause.message : String(cause)}`,
          );
        }
        return this.project(partial, text);
    }
  }

  private project(row: Row | undefined, corruptText: string | null): Row {
    return this.outputSchema.fields.map((_, i): Value => {
      if (i === this.corruptIndex) return corruptText;
      const source = this.projection[i] ?? -1;
      if (row === undefined || source === -1) return null;
      return row[source] ?? null;
    });
  }
}
