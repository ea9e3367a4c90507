/**
 * Measures the cost of a single record in caller-defined units.
 *
 * Must be pure and return a finite, non-negative number. It is called exactly
 * once per record pulled from the source; whatever it throws reaches the
 * consumer unchanged.
 */
export type SizeCalcFn<T> = (record: T) => number;
