import * as _ from 'lodash';
import type { InputSymbol } from './TransitionSpec';

/** A string is read one character (code point) per symbol; arrays are taken as-is. */
export function splitToSymbols (val: string | readonly InputSymbol[]): InputSymbol[] {
  if (_.isString(val))
    return _.toArray(val);
  else
    return val.map(String);
}
