/** What to do with a record whose own size exceeds the record limit. */
export const RecordSizePolicy = {
  /** Drop the record silently. It appears in no batch. */
  SKIP: 'skip',
  /** Fail the run with `RecordTooLargeError`. */
  ERROR: 'error',
} as const;

export type RecordSizePolicy = (typeof RecordSizePolicy)[keyof typeof RecordSizePolicy];

export function isRecordSizePolicy(value: unknown): value is RecordSizePolicy {
  return value === RecordSizePolicy.SKIP || value === RecordSizePolicy.ERROR;
}
