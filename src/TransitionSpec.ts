import * as yup from 'yup';
import { config } from './config';
import TransitionTable from './TransitionTable';

export type State = string;
export type InputSymbol = string;
export type StackSymbol = string;

/** Lookup key of a DPDA move. `read` is the epsilon marker for lambda moves. */
export interface TransitionKey {
  readonly from: State;
  readonly read: InputSymbol;
  readonly top: StackSymbol;
}

/**
 * Result of a DPDA move. The matched top symbol is popped and `push` is pushed,
 * leaving its last symbol on top; an empty `push` only pops.
 */
export interface TransitionValue {
  readonly to: State;
  readonly push: readonly StackSymbol[];
}

export type PDATransition = TransitionKey & TransitionValue;

// Sets are cast to arrays; a missing set still fails.
const SymbolSetSchema = yup
  .array(yup.string().defined())
  .transform((value: unknown, original: unknown) =>
    original instanceof Set ? Array.from(original) : value)
  .defined();

export const PDATransitionSchema = yup.object({
  from: yup.string().defined(),
  read: yup.string().defined(),
  top: yup.string().defined(),
  to: yup.string().defined(),
  push: yup.array(yup.string().defined()).defined(),
});

export const DPDASpecSchema = yup.object({
  states: SymbolSetSchema,
  inputSymbols: SymbolSetSchema,
  stackSymbols: SymbolSetSchema,
  transitions: yup
    .array(PDATransitionSchema.defined())
    .transform((value: unknown, original: unknown) =>
      original instanceof TransitionTable ? Array.from(original) : value)
    .defined(),
  initialState: yup.string().defined(),
  initialStackSymbol: yup.string().defined(),
  finalStates: SymbolSetSchema,
  epsilon: yup.string().defined().default(() => config.epsilon),
});

export type DPDASpec = yup.InferType<typeof DPDASpecSchema>;

export type SymbolCollection<T extends string> = ReadonlySet<T> | readonly T[];

/** What a caller hands to the DPDA constructor. */
export interface DPDADefinition {
  states: SymbolCollection<State>;
  inputSymbols: SymbolCollection<InputSymbol>;
  stackSymbols: SymbolCollection<StackSymbol>;
  transitions: TransitionTable | readonly PDATransition[];
  initialState: State;
  initialStackSymbol: StackSymbol;
  finalStates: SymbolCollection<State>;
  /** Marker for lambda moves; defaults to the configured epsilon (`''`). */
  epsilon?: InputSymbol;
}
