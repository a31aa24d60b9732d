export { default as DPDA } from './DPDA';
export { default as DPDASimulator } from './DPDASimulator';
export { default as PDAConfiguration } from './PDAConfiguration';
export { default as PDAStack } from './PDAStack';
export { default as TransitionTable } from './TransitionTable';
export { StateAutomaton } from './StateAutomaton';
export {
  AutomatonError,
  AutomatonSpecError,
  InvalidStateError,
  InvalidSymbolError,
  NondeterminismError,
  RejectionError,
  type ErrorDetails,
} from './AutomatonError';
export {
  rules,
  validateDPDA,
  validateEpsilon,
  validateFinalStates,
  validateInitialStackSymbol,
  validateInitialState,
  validateNondeterminism,
  validateTransitionStates,
  validateTransitionSymbols,
  type DPDAShape,
  type ValidationRule,
} from './DPDAValidator';
export {
  DPDASpecSchema,
  PDATransitionSchema,
  type DPDADefinition,
  type DPDASpec,
  type InputSymbol,
  type PDATransition,
  type StackSymbol,
  type State,
  type SymbolCollection,
  type TransitionKey,
  type TransitionValue,
} from './TransitionSpec';
export { config, loadConfig, type AutomatonConfig } from './config';
