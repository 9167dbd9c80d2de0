/**
 * The logging sink the mediator writes to. The global console satisfies it.
 */
export type MediatorLogger = Pick<Console, "debug" | "warn" | "error">;

/**
 * A logger that discards everything.
 */
export const silentLogger: MediatorLogger = {
  debug: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Initial values for {@link MediatorOptions}.
 */
export interface MediatorOptionsInit {
  logger?: MediatorLogger;
  timeoutMs?: number;
}

/**
 * Configuration options for a mediator.
 */
export class MediatorOptions {
  /**
   * Gets or sets where dispatch diagnostics are written. Defaults to the console.
   */
  public logger: MediatorLogger;

  /**
   * Gets the time limit applied to every dispatch, in milliseconds.
   * When unset, a dispatch only ends early through the caller's own signal.
   */
  public readonly timeoutMs?: number;

  /**
   * Creates a new instance of MediatorOptions.
   * @param init Optional initial values
   * @throws RangeError if timeoutMs is not a positive finite number
   */
  constructor(init: MediatorOptionsInit = {}) {
    if (init.timeoutMs !== undefined && !(Number.isFinite(init.timeoutMs) && init.timeoutMs > 0)) {
      throw new RangeError(`timeoutMs must be a positive number of milliseconds, got ${init.timeoutMs}.`);
    }
    this.logger = init.logger ?? console;
    this.timeoutMs = init.timeoutMs;
  }
}
