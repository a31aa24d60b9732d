'use strict';

import * as _ from 'lodash';
import {
  AutomatonError, InvalidStateError, InvalidSymbolError, NondeterminismError
} from './AutomatonError';
import { debug } from './log';
import type TransitionTable from './TransitionTable';
import type { InputSymbol, PDATransition, StackSymbol, State } from './TransitionSpec';

/** The parts of a DPDA the validation rules look at. */
export interface DPDAShape {
  readonly states: ReadonlySet<State>;
  readonly inputSymbols: ReadonlySet<InputSymbol>;
  readonly stackSymbols: ReadonlySet<StackSymbol>;
  readonly transitions: TransitionTable;
  readonly initialState: State;
  readonly initialStackSymbol: StackSymbol;
  readonly finalStates: ReadonlySet<State>;
  readonly epsilon: InputSymbol;
}

export type ValidationRule = (dpda: DPDAShape) => void;

const label = (trans: PDATransition) =>
  trans.from + '->' + trans.to + ': ' + trans.read + ', ' + trans.top + ' ↦ [' + trans.push + ']';

function fail (error: AutomatonError): never {
  debug('Validation failed:', error.reason, error.details.problemValue);
  throw error;
}

export const validateTransitionSymbols: ValidationRule = (dpda) => {
  for (const transition of dpda.transitions) {
    if (transition.read !== dpda.epsilon && !dpda.inputSymbols.has(transition.read)) {
      fail(new InvalidSymbolError(
        `Input symbol ${transition.read} of transition ${label(transition)} is not in the input alphabet`,
        { problemValue: transition.read }));
    }
    const badStackSymbol = _.find([transition.top, ...transition.push],
      (symbol) => !dpda.stackSymbols.has(symbol));
    if (badStackSymbol !== undefined) {
      fail(new InvalidSymbolError(
        `Stack symbol ${badStackSymbol} of transition ${label(transition)} is not in the stack alphabet`,
        { problemValue: badStackSymbol }));
    }
  }
};

export const validateTransitionStates: ValidationRule = (dpda) => {
  for (const transition of dpda.transitions) {
    const badState = _.find([transition.from, transition.to], (state) => !dpda.states.has(state));
    if (badState !== undefined) {
      fail(new InvalidStateError(
        `State ${badState} of transition ${label(transition)} is not declared`,
        { problemValue: badState }));
    }
  }
};

/**
 * A lambda move must be the only move for its (state, stack top) pair:
 * otherwise the machine could either take it or read more input.
 */
export const validateNondeterminism: ValidationRule = (dpda) => {
  const groups = _.groupBy([...dpda.transitions], (trans) => JSON.stringify([trans.from, trans.top]));
  _.forOwn(groups, (transs) => {
    const lambda = _.find(transs, (trans) => trans.read === dpda.epsilon);
    if (lambda !== undefined && transs.length > 1) {
      const rivals = _.without(transs, lambda);
      fail(new NondeterminismError(
        `Lambda transition ${label(lambda)} competes with ${rivals.map(label).join(' AND ')}`,
        { problemValue: [lambda, ...rivals] }));
    }
  });
};

export const validateInitialState: ValidationRule = (dpda) => {
  if (!dpda.states.has(dpda.initialState)) {
    fail(new InvalidStateError(`Initial state ${dpda.initialState} is not declared`,
      { problemValue: dpda.initialState }));
  }
};

export const validateInitialStackSymbol: ValidationRule = (dpda) => {
  if (!dpda.stackSymbols.has(dpda.initialStackSymbol)) {
    fail(new InvalidSymbolError(`Initial stack symbol ${dpda.initialStackSymbol} is not in the stack alphabet`,
      { problemValue: dpda.initialStackSymbol }));
  }
};

export const validateFinalStates: ValidationRule = (dpda) => {
  const badStates = _.reject([...dpda.finalStates], (state) => dpda.states.has(state));
  if (badStates.length) {
    fail(new InvalidStateError(`Final states ${badStates.join(', ')} are not declared`,
      { problemValue: badStates }));
  }
};

export const validateEpsilon: ValidationRule = (dpda) => {
  if (dpda.inputSymbols.has(dpda.epsilon)) {
    fail(new InvalidSymbolError('The epsilon symbol cannot be part of the input alphabet',
      { problemValue: dpda.epsilon }));
  }
};

export const rules: readonly ValidationRule[] = [
  validateTransitionSymbols,
  validateTransitionStates,
  validateNondeterminism,
  validateInitialState,
  validateInitialStackSymbol,
  validateFinalStates,
  validateEpsilon,
];

/** Run every rule against the automaton's current contents; throws on the first violation. */
export function validateDPDA (dpda: DPDAShape): true {
  rules.forEach((rule) => rule(dpda));
  return true;
}
