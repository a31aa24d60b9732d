'use strict';

import * as util from 'util';
import * as _ from 'lodash';
import PDAStack from './PDAStack';
import type { InputSymbol, State } from './TransitionSpec';

/** A snapshot of one point in a DPDA run. */
export default class PDAConfiguration {
  public readonly state: State;
  public readonly remainingInput: readonly InputSymbol[];
  public readonly stack: PDAStack;

  constructor (state: State, remainingInput: Iterable<InputSymbol>, stack: PDAStack) {
    this.state = state;
    this.remainingInput = Object.freeze(Array.from(remainingInput));
    this.stack = stack;
  }

  public equals (other: PDAConfiguration): boolean {
    return this.state === other.state
      && _.isEqual(this.remainingInput, other.remainingInput)
      && this.stack.equals(other.stack);
  }

  public toString (): string {
    const inspect = (value: unknown) => util.inspect(value, { breakLength: Infinity });
    return 'PDAConfiguration(' + [
      inspect(this.state),
      inspect([...this.remainingInput]),
      String(this.stack)
    ].join(', ') + ')';
  }

  public [util.inspect.custom] (): string {
    return this.toString();
  }
}
