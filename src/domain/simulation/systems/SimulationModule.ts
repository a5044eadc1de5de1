/**
 * Contract shared by every module the runner ticks.
 */
export interface SimulationModule {
  /**
   * @param systemTick - TRUE when pulsed at the fast system rate, FALSE when
   * pulsed once per simulated turn.
   */
  onTick(systemTick: boolean): void;

  /** Clears everything the module created so a new game can start. */
  destroy(): void;
}
