/**
 * Runtime configuration read from the environment.
 */

/** Development-only warnings are emitted unless NODE_ENV is "production". */
export const DEV_MODE = process.env.NODE_ENV !== "production";
