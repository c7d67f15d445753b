import { EnvironmentError, InvalidConfigurationError, MalformedRecordError } from './errors';

describe('errors', () => {
  it('names errors after their class and keeps the cause', () => {
    const cause = new Error('bad byte');
    const error = new InvalidConfigurationError('Take needs a count', { count: -1 }, cause);
    expect(error).toBeInstanceOf(EnvironmentError);
    expect(error.name).toBe('InvalidConfigurationError');
    expect(error.context).toEqual({ count: -1 });
    expect(error.cause).toBe(cause);
  });

  it('locates malformed records in their message', () => {
    const error = new MalformedRecordError('Too many fields', { sourceId: 'rows.csv', rowIndex: 4 });
    expect(error.message).toBe('Too many fields (source: rows.csv, row: 4)');
  });
});
