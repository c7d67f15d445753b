import { logger, loggerPrefix } from '../application-logger';
import { MalformedRecordError } from '../errors';
import { RawRow } from '../types';

export type Lines = AsyncIterable<string> | Iterable<string>;

export interface IReaderOptions {
  // names the source in errors and warnings
  sourceId?: string;
  // abort the whole sequence on the first malformed record instead of skipping it
  strict?: boolean;
  // receives skipped records; when omitted they are logged as warnings
  onMalformedRecord?: (error: MalformedRecordError) => void;
}

/** Parses a stream of text lines into raw rows. */
export interface IRowReader {
  read(lines: Lines): AsyncIterable<RawRow>;
}

export function reportMalformedRecord(error: MalformedRecordError, options: IReaderOptions): void {
  if (options.strict) {
    throw error;
  }
  if (options.onMalformedRecord) {
    options.onMalformedRecord(error);
    return;
  }
  logger.warn(error.context, `${loggerPrefix} Skipping malformed record: ${error.message}`);
}
