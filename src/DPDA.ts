'use strict';

import * as util from 'util';
import * as yup from 'yup';
import * as _ from 'lodash';
import { AutomatonSpecError, RejectionError } from './AutomatonError';
import DPDASimulator from './DPDASimulator';
import { validateDPDA, type DPDAShape } from './DPDAValidator';
import type PDAConfiguration from './PDAConfiguration';
import TransitionTable from './TransitionTable';
import {
  DPDASpecSchema,
  type DPDADefinition, type DPDASpec, type InputSymbol, type StackSymbol, type State
} from './TransitionSpec';
import { splitToSymbols } from './symbol-utils';
import { debug } from './log';

function parseDefinition (definition: unknown): DPDASpec {
  try {
    return DPDASpecSchema.validateSync(definition, { abortEarly: false });
  } catch (e) {
    if (e instanceof yup.ValidationError) {
      throw new AutomatonSpecError('Validation Error', { validationErrors: e.errors });
    }
    throw e;
  }
}

/**
 * A deterministic pushdown automaton.
 *
 * Every field is public and mutable: edit the transition table or the state
 * sets, then call `validate()` again to re-check the current contents.
 */
export default class DPDA implements DPDAShape {
  public states: Set<State>;
  public inputSymbols: Set<InputSymbol>;
  public stackSymbols: Set<StackSymbol>;
  public transitions: TransitionTable;
  public initialState: State;
  public initialStackSymbol: StackSymbol;
  public finalStates: Set<State>;
  public readonly epsilon: InputSymbol;

  /**
   * @param definition  All fields but `epsilon` are required; a missing or
   *   malformed field throws an AutomatonSpecError.
   */
  constructor (definition: DPDADefinition) {
    const spec = parseDefinition(definition);

    this.states = new Set(spec.states);
    this.inputSymbols = new Set(spec.inputSymbols);
    this.stackSymbols = new Set(spec.stackSymbols);
    this.transitions = TransitionTable.from(spec.transitions);
    this.initialState = spec.initialState;
    this.initialStackSymbol = spec.initialStackSymbol;
    this.finalStates = new Set(spec.finalStates);
    this.epsilon = spec.epsilon;
  }

  /** Build a DPDA from an untyped value, e.g. one decoded from JSON. */
  public static fromSpec (spec: unknown): DPDA {
    return new DPDA(parseDefinition(spec));
  }

  /** An equal automaton that shares no mutable structure with this one. */
  public copy (): DPDA {
    return new DPDA({
      states: this.states,
      inputSymbols: this.inputSymbols,
      stackSymbols: this.stackSymbols,
      transitions: this.transitions,
      initialState: this.initialState,
      initialStackSymbol: this.initialStackSymbol,
      finalStates: this.finalStates,
      epsilon: this.epsilon,
    });
  }

  public equals (other: DPDA): boolean {
    return _.isEqual(this.states, other.states)
      && _.isEqual(this.inputSymbols, other.inputSymbols)
      && _.isEqual(this.stackSymbols, other.stackSymbols)
      && this.transitions.equals(other.transitions)
      && this.initialState === other.initialState
      && this.initialStackSymbol === other.initialStackSymbol
      && _.isEqual(this.finalStates, other.finalStates)
      && this.epsilon === other.epsilon;
  }

  /**
   * Check the automaton is well formed and deterministic.
   * Throws InvalidStateError, InvalidSymbolError or NondeterminismError.
   */
  public validate (): true {
    return validateDPDA(this);
  }

  /**
   * Yield each configuration of the run on `input`, starting with the initial one.
   * Throws a RejectionError once the machine halts without accepting;
   * otherwise the halting configuration is also the generator's return value.
   */
  public *readInputStepwise (input: string | readonly InputSymbol[]): Generator<PDAConfiguration, PDAConfiguration, void> {
    const simulator = new DPDASimulator(this, splitToSymbols(input));
    const last = yield* simulator.run();

    if (!simulator.isAccepted) {
      throw new RejectionError('Input rejected', last);
    }
    debug('Accepted:', last);
    return last;
  }

  /** Run to a halt; returns the accepting configuration or throws a RejectionError. */
  public readInput (input: string | readonly InputSymbol[]): PDAConfiguration {
    const steps = this.readInputStepwise(input);
    let result = steps.next();
    while (!result.done) {
      result = steps.next();
    }
    return result.value;
  }

  public acceptsInput (input: string | readonly InputSymbol[]): boolean {
    try {
      this.readInput(input);
      return true;
    } catch (e) {
      if (e instanceof RejectionError) return false;
      throw e;
    }
  }

  public toString (): string {
    const inspect = (value: unknown) => util.inspect(value, { breakLength: Infinity });
    return [
      'states: ' + inspect(this.states),
      'input symbols: ' + inspect(this.inputSymbols),
      'stack symbols: ' + inspect(this.stackSymbols),
      'initial state: ' + this.initialState,
      'initial stack symbol: ' + this.initialStackSymbol,
      'final states: ' + inspect(this.finalStates),
      'epsilon: ' + inspect(this.epsilon),
      'transitions:',
      this.transitions.toString(this.epsilon),
    ].join('\n');
  }
}
