/**
 * Output manager for controlling console output verbosity
 *
 * Supports three levels:
 * - quiet: Only errors and command results
 * - normal: Errors, warnings, info, and command results (default)
 * - verbose: All output including session load details
 */

export type OutputLevel = 'quiet' | 'normal' | 'verbose';

class OutputManager {
  private static instance: OutputManager | null = null;
  private level: OutputLevel = 'normal';

  private constructor() {
    this.level = OutputManager.levelFromEnv();
  }

  static getInstance(): OutputManager {
    if (!OutputManager.instance) {
      OutputManager.instance = new OutputManager();
    }
    return OutputManager.instance;
  }

  private static levelFromEnv(): OutputLevel {
    if (process.env.NAMEFORGE_QUIET === '1') {
      return 'quiet';
    }
    if (process.env.NAMEFORGE_VERBOSE === '1') {
      return 'verbose';
    }
    return 'normal';
  }

  /**
   * Set output level (CLI flags override environment variables)
   */
  setLevel(level: OutputLevel): void {
    this.level = level;
  }

  /**
   * Go back to the level given by the environment
   */
  resetLevel(): void {
    this.level = OutputManager.levelFromEnv();
  }

  private isQuiet(): boolean {
    return this.level === 'quiet';
  }

  private isVerbose(): boolean {
    return this.level === 'verbose';
  }

  /**
   * Info message - shown in normal and verbose modes
   */
  info(message: string): void {
    if (!this.isQuiet()) {
      console.log(message);
    }
  }

  /**
   * Success message - shown in normal and verbose modes
   */
  success(message: string): void {
    if (!this.isQuiet()) {
      console.log(message);
    }
  }

  /**
   * Command result (a solved name, a parsed record) - always shown
   */
  result(message: string): void {
    console.log(message);
  }

  /**
   * Warning message - always shown
   */
  warn(message: string): void {
    console.warn(message);
  }

  /**
   * Error message - always shown
   */
  error(message: string): void {
    console.error(message);
  }

  /**
   * Verbose message - only shown in verbose mode
   */
  verbose(message: string): void {
    if (this.isVerbose()) {
      console.log(message);
    }
  }
}

// Export singleton instance
export const output = OutputManager.getInstance();
