'use strict';

import * as _ from 'lodash';
import type { InputSymbol, PDATransition, TransitionKey, TransitionValue } from './TransitionSpec';

function encodeKey (key: TransitionKey): string {
  return JSON.stringify([key.from, key.read, key.top]);
}

/**
 * The DPDA move function, keyed by (state, input or epsilon, stack top).
 * An absent key means no move. Callers may edit it freely.
 */
export default class TransitionTable implements Iterable<PDATransition> {
  private readonly entries = new Map<string, PDATransition>();

  public static from (transitions: Iterable<PDATransition>): TransitionTable {
    const table = new TransitionTable();
    for (const transition of transitions) {
      table.set(transition, transition);
    }
    return table;
  }

  public get size (): number { return this.entries.size; }

  public get (key: TransitionKey): TransitionValue | undefined {
    return this.entries.get(encodeKey(key));
  }

  public has (key: TransitionKey): boolean {
    return this.entries.has(encodeKey(key));
  }

  /** Define or replace the move for `key`. */
  public set (key: TransitionKey, value: TransitionValue): this {
    this.entries.set(encodeKey(key), Object.freeze({
      from: key.from,
      read: key.read,
      top: key.top,
      to: value.to,
      push: Object.freeze([...value.push]),
    }));
    return this;
  }

  public delete (key: TransitionKey): boolean {
    return this.entries.delete(encodeKey(key));
  }

  public *[Symbol.iterator] (): Iterator<PDATransition> {
    yield* this.entries.values();
  }

  public copy (): TransitionTable {
    return TransitionTable.from(this);
  }

  public equals (other: TransitionTable): boolean {
    return this.size === other.size
      && _.every([...this], (transition) => _.isEqual(other.get(transition), transition));
  }

  /** One line per transition; moves reading `epsilon` are shown as `ε`. */
  public toString (epsilon: InputSymbol = ''): string {
    return [...this]
      .map((t) => `${t.from} -> ${t.to}: ${t.read === epsilon ? 'ε' : t.read}, ${t.top} ↦ [${t.push.join(', ')}]`)
      .join('\n');
  }
}
