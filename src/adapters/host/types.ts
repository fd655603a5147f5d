/**
 * Host Interfaces
 *
 * The host owns the console command pump. The core registers itself as one
 * top-level command and may ask the host to run a line later.
 */

/**
 * A top-level console command. Receives the tokens after its name.
 */
export type TopLevelCommand = (tokens: string[]) => Promise<void>;

/**
 * Runs console lines, one at a time.
 */
export interface CommandHost {
  execute(line: string): Promise<void>;

  registerCommand(name: string, command: TopLevelCommand): void;

  unregisterCommand(name: string): void;
}

/**
 * Fire-once delayed execution. No cancellation handle is exposed.
 */
export interface Scheduler {
  schedule(delaySeconds: number, callback: () => Promise<void>): void;
}
