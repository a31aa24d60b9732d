import { DPDA } from '../src';

/**
 * Accepts { aⁿbⁿ | n ≥ 1 } by final state: a marker `1` is pushed for each
 * `a` and popped for each `b`; once only the bottom `0` is left, a lambda
 * move enters `q3`.
 */
export function makeAnBn (): DPDA {
  return new DPDA({
    states: new Set(['q0', 'q1', 'q2', 'q3']),
    inputSymbols: new Set(['a', 'b']),
    stackSymbols: new Set(['0', '1']),
    transitions: [
      { from: 'q0', read: 'a', top: '0', to: 'q1', push: ['0', '1'] },
      { from: 'q1', read: 'a', top: '1', to: 'q1', push: ['1', '1'] },
      { from: 'q1', read: 'b', top: '1', to: 'q2', push: [] },
      { from: 'q2', read: 'b', top: '1', to: 'q2', push: [] },
      { from: 'q2', read: '', top: '0', to: 'q3', push: ['0'] },
    ],
    initialState: 'q0',
    initialStackSymbol: '0',
    finalStates: new Set(['q3']),
    epsilon: '',
  });
}
