/**
 * `@repo/dca-core` holds the scheduling and settlement rules of the DCA
 * protocol: schemas, errors, domain events, the fee curve, the schedule table
 * and the purchase authorizer. It never touches collaborators or a clock.
 */
export * from "./contracts";
export * from "./errors";
export * from "./events";
export * from "./fees";
export * from "./schedule-store";
export * from "./purchase-authorizer";
