import * as util from 'util';
import { config } from './config';

/** Trace to the console when `DPDA_DEBUG` is on. */
export function debug (message: string, ...values: unknown[]): void {
  if (!config.debug) return;
  console.log(message, ...values.map((value) => util.inspect(value, false, null, true)));
}
