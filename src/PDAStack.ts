'use strict';

import * as util from 'util';
import * as _ from 'lodash';
import type { StackSymbol } from './TransitionSpec';

/**
 * Immutable pushdown stack. The first element is the top of the stack.
 */
export default class PDAStack implements Iterable<StackSymbol> {
  private readonly symbols: readonly StackSymbol[];

  constructor (symbols: Iterable<StackSymbol> = []) {
    this.symbols = Object.freeze(Array.from(symbols));
  }

  /** The top symbol, or undefined when the stack is empty. */
  public top (): StackSymbol | undefined {
    return this.symbols[0];
  }

  public get isEmpty (): boolean { return this.symbols.length === 0; }

  public get size (): number { return this.symbols.length; }

  public pop (): PDAStack {
    return new PDAStack(this.symbols.slice(1));
  }

  /**
   * Push a replacement sequence. The last symbol of `symbols` ends up on top,
   * so `new PDAStack(['x']).push(['a', 'b'])` is `['b', 'a', 'x']`.
   */
  public push (symbols: readonly StackSymbol[]): PDAStack {
    return new PDAStack([..._.reverse([...symbols]), ...this.symbols]);
  }

  // immutable, so the instance itself is a faithful copy
  public copy (): PDAStack {
    return this;
  }

  public *[Symbol.iterator] (): Iterator<StackSymbol> {
    yield* this.symbols;
  }

  public equals (other: PDAStack): boolean {
    return _.isEqual(this.symbols, other.symbols);
  }

  public toString (): string {
    return 'PDAStack(' + util.inspect([...this.symbols], { breakLength: Infinity }) + ')';
  }

  public [util.inspect.custom] (): string {
    return this.toString();
  }
}
