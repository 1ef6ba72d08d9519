import type { StoreLogger } from "./StoreLogger.js";

/**
 * Silent logger that discards all output.
 * Used in tests to suppress console noise.
 */
export const silentLogger: StoreLogger = {
  success(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
};
