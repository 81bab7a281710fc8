// =============================================================================
// Constants
// =============================================================================

export const MAX_NODE_ID = 232;
export const MAX_CALLBACK_ID = 0xff;

export const USB_FILTERS = [
  { vendorId: "0658", productId: "0200" }, // Sigma Designs / Aeotec Z-Stick
  { vendorId: "10c4", productId: "ea60" }, // Silicon Labs CP210x
] as const;

// =============================================================================
// Logging
// =============================================================================

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  debug(message: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
}

/**
 * Console logger. Debug lines are only written in verbose mode.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return {
    info: (message) => console.log(message),
    warn: (message) => console.error(`Warning: ${message}`),
    debug: (message) => {
      if (options.verbose) {
        console.log(`  [DEBUG] ${message}`);
      }
    },
  };
}

// =============================================================================
// Argument Helpers
// =============================================================================

export function parseNodeId(input: string | number): number {
  const parsed = typeof input === "string" ? parseDigits(input) : input;
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > MAX_NODE_ID) {
    throw new Error(`Invalid node id: ${input}. Must be 1-${MAX_NODE_ID}.`);
  }
  return parsed;
}

/**
 * Callback id placed in a SEND_DATA packet; one byte, 0 means "no callback".
 */
export function parseCallbackId(input: string): number {
  const parsed = parseDigits(input);
  if (isNaN(parsed) || parsed < 1 || parsed > MAX_CALLBACK_ID) {
    throw new Error(`Invalid callback id: ${input}. Must be 1-${MAX_CALLBACK_ID}.`);
  }
  return parsed;
}

export function parseTimeout(input: string): number {
  const parsed = parseInt(input, 10);
  if (isNaN(parsed) || parsed <= 0) {
    throw new Error(`Invalid timeout: ${input}`);
  }
  return parsed;
}

/** Whole decimal number, or NaN for anything else such as "12abc" */
function parseDigits(input: string): number {
  const trimmed = input.trim();
  return /^\d+$/.test(trimmed) ? parseInt(trimmed, 10) : NaN;
}

export function matchesUsbFilter(vendorId: string | undefined, productId: string | undefined): boolean {
  if (!vendorId || !productId) return false;
  const vid = vendorId.toLowerCase();
  const pid = productId.toLowerCase();
  return USB_FILTERS.some((f) => f.vendorId === vid && f.productId === pid);
}

// =============================================================================
// Error Helpers
// =============================================================================

/**
 * Extract error message from unknown error type.
 */
export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
