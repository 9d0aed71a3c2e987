/**
 * Output Port Interface
 *
 * Defines the contract for user-facing output. Core logic writes notices here
 * instead of to the console so the host can route them through its own IO.
 * Diagnostics that only matter when debugging go to the logger instead.
 *
 * Implementations:
 *   - consoleOutput (default): plain console.log
 *   - host adapters: whatever IO the host package manager offers
 */
export interface OutputPort {
  /** Display an informational message */
  info(message: string): void;

  /** Display a warning message */
  warn(message: string): void;
}
