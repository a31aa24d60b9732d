'use strict';

import PDAConfiguration from './PDAConfiguration';
import PDAStack from './PDAStack';
import { StateAutomaton } from './StateAutomaton';
import type { DPDAShape } from './DPDAValidator';
import type { InputSymbol, PDATransition } from './TransitionSpec';
import { debug } from './log';

export default class DPDASimulator extends StateAutomaton<PDAConfiguration, PDATransition> {
  private readonly dpda: DPDAShape;
  private current: PDAConfiguration;

  /**
   * Start a run of `dpda` on `input`.
   * The stack starts out holding only the initial stack symbol.
   */
  constructor (dpda: DPDAShape, input: readonly InputSymbol[]) {
    super();

    this.dpda = dpda;
    this.current = new PDAConfiguration(
      dpda.initialState, input, new PDAStack([dpda.initialStackSymbol]));
  }

  public get configuration (): PDAConfiguration { return this.current; }

  public toString (): string {
    return [
      this.current.state,
      this.current.remainingInput.join(' '),
      String(this.current.stack)
    ].join('\n');
  }

  // lambda moves first, then a move on the next input symbol
  public get nextTransition (): PDATransition | undefined {
    const { state, remainingInput, stack } = this.current;
    const top = stack.top();
    if (top === undefined) return undefined;

    const lambda = this.lookup(state, this.dpda.epsilon, top);
    if (lambda !== undefined) return lambda;

    if (remainingInput.length === 0) return undefined;
    return this.lookup(state, remainingInput[0], top);
  }

  private lookup (from: string, read: InputSymbol, top: string): PDATransition | undefined {
    const value = this.dpda.transitions.get({ from, read, top });
    return value && { from, read, top, to: value.to, push: value.push };
  }

  public step (): boolean {
    const instruct = this.nextTransition;
    if (instruct === undefined) {
      debug('Halted:', this.current);
      return false;
    }

    const { remainingInput, stack } = this.current;
    const consumed = instruct.read === this.dpda.epsilon ? 0 : 1;
    this.current = new PDAConfiguration(
      instruct.to,
      remainingInput.slice(consumed),
      stack.pop().push(instruct.push));
    debug('Step:', this.current);
    return true;
  }

  public get isAccepted (): boolean {
    const { state, remainingInput, stack } = this.current;
    return remainingInput.length === 0
      && (this.dpda.finalStates.has(state) || stack.isEmpty);
  }
}
