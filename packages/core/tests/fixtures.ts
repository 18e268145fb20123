import type { DataResult } from '../src/types/results.js';
import { isError, describeError } from '../src/types/results.js';

/** The data of a successful result; fails the test on an error result */
export function unwrap<T>(result: DataResult<T>): T {
  if (isError(result)) throw new Error(`Expected success, got ${result.type}: ${describeError(result)}`);
  return result.data;
}
