import { describe, it, expect } from 'vitest';
import { Batcher } from '../../src/Batcher.js';
import { CsvParser } from '../../src/infrastructure/parsers/CsvParser.js';
import type { CsvRow } from '../../src/infrastructure/parsers/CsvParser.js';
import { jsonByteLength } from '../../src/domain/services/sizeFunctions.js';

describe('CSV rows through a Batcher', () => {
  const csv = ['id,name', '1,Al', '2,Bea', '3,Cy', '4,a-name-far-too-long-for-any-batch', '5,Di'].join('\n');

  it('should batch parsed rows by their JSON byte size', () => {
    // {"id":"1","name":"Al"} is 22 bytes, Bea adds 1, the long name row is 53.
    const batcher = new Batcher<CsvRow>(new CsvParser().parse(csv), {
      maxBatchLen: 10,
      maxBatchSize: 50,
      sizeCalcFn: jsonByteLength,
      whenRecordSizeExceeded: 'skip',
    });

    const batches = batcher.batches();

    expect(batches.map((batch) => batch.map((row) => row.id))).toEqual([['1', '2'], ['3', '5']]);
    expect(batcher.getStats()).toEqual({
      status: 'COMPLETED',
      recordsPulled: 5,
      recordsBatched: 4,
      recordsSkipped: 1,
      batchesEmitted: 2,
    });
  });
});
