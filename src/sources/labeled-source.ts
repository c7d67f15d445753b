import { MalformedRecordError } from '../errors';
import { LabeledRow, Params } from '../types';

import { ILineSource } from './line-source';
import { IRowReader } from './reader-options';

/** A re-readable sequence of labeled observations, the input of a supervised simulation. */
export interface ILabeledSource {
  readonly params: Params;
  read(): AsyncIterable<LabeledRow>;
}

/** Parses a line source with a row reader and hands on the labeled rows. */
export class LabeledRowSource implements ILabeledSource {
  constructor(
    private readonly lines: ILineSource,
    private readonly reader: IRowReader,
  ) {}

  get params(): Params {
    return { source: this.lines.id };
  }

  async *read(): AsyncIterable<LabeledRow> {
    for await (const row of this.reader.read(this.lines.read())) {
      if (row.label === undefined) {
        throw new MalformedRecordError(`Rows read from ${this.lines.id} have no label column`, {
          sourceId: this.lines.id,
          rowIndex: row.index,
        });
      }
      yield { features: row.features, label: row.label };
    }
  }
}
