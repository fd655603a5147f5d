/**
 * Host Adapter Exports
 */

export type { CommandHost, Scheduler, TopLevelCommand } from "./types.js";
export { ConsoleHost } from "./host.js";
export { TimerScheduler } from "./scheduler.js";
