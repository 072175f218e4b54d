import chalk from "chalk";

class Logger {
  private debugEnabled = false;

  /** Enable or disable debug logging */
  setDebug(enabled: boolean): void {
    this.debugEnabled = enabled;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.debugEnabled) {
      console.error(chalk.gray(`[DEBUG] ${message}`), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    console.log(message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`[WARN] ${message}`), ...args);
  }

  error(message: string, ...args: unknown[]): void {
    console.error(chalk.red(`[ERROR] ${message}`), ...args);
  }

  success(message: string, ...args: unknown[]): void {
    console.log(chalk.green(message), ...args);
  }

  /**
   * Log an upstream request as a curl command (debug only)
   */
  logRequest(method: string, url: string, headers?: Record<string, string>): void {
    if (!this.debugEnabled) return;

    let curl = `curl -X ${method} '${url}'`;
    if (headers) {
      for (const [key, value] of Object.entries(headers)) {
        curl += ` \\\n  -H '${key}: ${value}'`;
      }
    }

    this.debug(`Request:\n${curl}`);
  }
}

/** Global logger instance */
export const logger = new Logger();
