/**
 * `@repo/dca-manager` wires the pure scheduling rules to the outside world:
 * the transactional ScheduleManager, the collaborator contracts it calls
 * through, an in-memory routing registry and a simulated handler.
 */
export * from "./types";
export * from "./adapters";
export * from "./handlers";
export * from "./registry";
export * from "./paper-handler";
export * from "./runtime-settings";
export * from "./schedule-manager";
