import { describe, it, expect } from 'vitest';
import { CsvParser } from '../../../src/infrastructure/parsers/CsvParser.js';

describe('CsvParser', () => {
  it('should map rows to header names', () => {
    const csv = 'email,name\nalice@test.com,Alice\nbob@test.com,Bob';

    const rows = [...new CsvParser().parse(csv)];

    expect(rows).toEqual([
      { email: 'alice@test.com', name: 'Alice' },
      { email: 'bob@test.com', name: 'Bob' },
    ]);
  });

  it('should handle Buffer input', () => {
    const rows = [...new CsvParser().parse(Buffer.from('id,name\n1,Test'))];

    expect(rows).toEqual([{ id: '1', name: 'Test' }]);
  });

  it('should use a configured delimiter', () => {
    const rows = [...new CsvParser({ delimiter: ';' }).parse('id;name\n1;Test')];

    expect(rows).toEqual([{ id: '1', name: 'Test' }]);
  });

  it('should keep values as strings', () => {
    const rows = [...new CsvParser().parse('count,active\n42,true')];

    expect(rows).toEqual([{ count: '42', active: 'true' }]);
  });

  it('should drop blank lines and rows with only empty values', () => {
    const csv = 'id,name\n1,Alice\n\n,\n2,Bob\n';

    const rows = [...new CsvParser().parse(csv)];

    expect(rows).toEqual([
      { id: '1', name: 'Alice' },
      { id: '2', name: 'Bob' },
    ]);
  });

  it('should keep quoted delimiters inside a value', () => {
    const rows = [...new CsvParser().parse('id,note\n1,"a, b"')];

    expect(rows).toEqual([{ id: '1', note: 'a, b' }]);
  });

  it('should yield nothing for a header-only file', () => {
    expect([...new CsvParser().parse('id,name')]).toEqual([]);
  });
});
