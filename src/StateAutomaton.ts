/**
 * A running automaton that steps from configuration to configuration.
 * `C` is the configuration type, `T` the transition type.
 */
export abstract class StateAutomaton<C, T> {
  public abstract get configuration(): C;

  public abstract toString(): string;

  /** The transition the next `step()` would take, if any. */
  public abstract get nextTransition(): T | undefined;

  /**
   * Step to the next configuration according to the transition function.
   * @return {boolean} true if successful (the transition is defined),
   *   false otherwise (machine halted)
   */
  public abstract step(): boolean;

  public get isHalted(): boolean { return this.nextTransition === undefined; }

  /** Whether the current configuration satisfies the acceptance condition. */
  public abstract get isAccepted(): boolean;

  /** Yield the current configuration, then one per step until halted. */
  public *run(): Generator<C, C, void> {
    yield this.configuration;
    while (this.step()) {
      yield this.configuration;
    }
    return this.configuration;
  }
}
