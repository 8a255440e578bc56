/**
 * Debug utility for nameforge
 * Controlled by NAMEFORGE_DEBUG environment variable:
 * - 0 or undefined: No debug output (default)
 * - 1: Basic debug information (skipped files, rejected settings)
 * - 2: Detailed debug information including record contents
 *
 * The level is read on every call so tests and long-lived hosts can change it.
 */

function debugLevel(): number {
  const level = Number.parseInt(process.env.NAMEFORGE_DEBUG || '0', 10);
  return Number.isNaN(level) ? 0 : level;
}

function isDebugEnabled(): boolean {
  return debugLevel() > 0;
}

function isVerboseDebugEnabled(): boolean {
  return debugLevel() >= 2;
}

export function debugLog(message: string, ...args: unknown[]): void {
  if (isDebugEnabled()) {
    console.error(`[NAMEFORGE] ${message}`, ...args);
  }
}

export function debugVerbose(message: string, ...args: unknown[]): void {
  if (isVerboseDebugEnabled()) {
    console.error(`[NAMEFORGE:VERBOSE] ${message}`, ...args);
  }
}

export function debugError(message: string, error: unknown): void {
  if (isDebugEnabled()) {
    console.error(`[NAMEFORGE:ERROR] ${message}`);
    if (error instanceof Error) {
      console.error(`  Message: ${error.message}`);
      if (isVerboseDebugEnabled() && error.stack) {
        console.error(`  Stack: ${error.stack}`);
      }
    } else {
      console.error(`  Error: ${String(error)}`);
    }
  }
}

/**
 * Format object for debug output
 */
export function debugFormat(obj: unknown): string {
  try {
    return JSON.stringify(obj, null, 2);
  } catch {
    return String(obj);
  }
}
