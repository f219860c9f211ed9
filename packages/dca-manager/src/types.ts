// ---------- Types ----------

/**
 * Log sink shared by the manager and the handlers. Metadata may carry
 * bigints, so adapters must not assume JSON-serializable values.
 */
export type Logger = {
  info: (msg: string, meta?: Record<string, unknown>) => void;
  warn: (msg: string, meta?: Record<string, unknown>) => void;
  error: (msg: string, meta?: Record<string, unknown>) => void;
};

/** Current time in whole seconds. */
export type Clock = () => number;

export const Roles = {
  /** Allowed to trigger purchases on behalf of schedule owners. */
  SWAPPER: "SWAPPER",
} as const;

export type Role = (typeof Roles)[keyof typeof Roles];
