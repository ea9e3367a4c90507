import Papa from 'papaparse';

/** One CSV data row, keyed by header name. */
export type CsvRow = Readonly<Record<string, string>>;

export interface CsvParserOptions {
  /** Column delimiter character (e.g. `','`, `';'`, `'\t'`). Default: auto-detected. */
  readonly delimiter?: string;
  /** Encoding used to decode Buffer input. Default: `'utf-8'`. */
  readonly encoding?: BufferEncoding;
}

/**
 * CSV record source using PapaParse. The first row is the header; rows whose
 * values are all empty are dropped.
 *
 * Its output feeds `Batcher` directly, e.g. with `jsonByteLength` as size function.
 */
export class CsvParser {
  private readonly delimiter: string | undefined;
  private readonly encoding: BufferEncoding;

  constructor(options?: CsvParserOptions) {
    this.delimiter = options?.delimiter;
    this.encoding = options?.encoding ?? 'utf-8';
  }

  *parse(data: string | Buffer): Iterable<CsvRow> {
    const content = typeof data === 'string' ? data : data.toString(this.encoding);

    const result = Papa.parse<Record<string, string>>(content, {
      header: true,
      delimiter: this.delimiter,
      skipEmptyLines: true,
      dynamicTyping: false,
    });

    for (const row of result.data) {
      if (isEmptyRow(row)) continue;
      yield row;
    }
  }
}

function isEmptyRow(row: CsvRow): boolean {
  return Object.values(row).every((v) => v === undefined || v === null || v === '');
}
