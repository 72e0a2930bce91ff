import chalk from "chalk";
import ora from "ora";

export type LogLevel = "quiet" | "normal" | "debug";

/**
 * Logger utility for consistent output formatting
 */
export class Logger {
  private level: LogLevel;
  private spinner = ora();
  private spinnerStartTime = 0;
  private spinnerActive = false;

  constructor(level: LogLevel = "normal") {
    this.level = level;
  }

  get isDebug(): boolean {
    return this.level === "debug";
  }

  /**
   * Log a message unless running quiet
   */
  log(message: string): void {
    if (this.level !== "quiet") {
      this.write(message);
    }
  }

  /**
   * Log a section header
   */
  logHeader(title: string): void {
    this.log("\n" + chalk.bgBlue.white(` ${title} `) + "\n");
  }

  info(message: string): void {
    this.log(chalk.blue(message));
  }

  success(message: string): void {
    this.log(chalk.green(message));
  }

  warn(message: string): void {
    this.log(chalk.yellow(message));
  }

  /**
   * Errors are printed even in quiet mode
   */
  error(message: string): void {
    if (this.spinnerActive) {
      this.spinnerActive = false;
      this.spinner.stop();
    }
    console.error(chalk.red(message));
  }

  debug(message: string): void {
    if (this.level === "debug") {
      this.write(chalk.gray(message));
    }
  }

  startSpinner(message: string): void {
    if (this.level !== "quiet") {
      this.spinnerStartTime = performance.now();
      this.spinnerActive = true;
      this.spinner.start(message);
    }
  }

  updateSpinner(message: string): void {
    if (this.spinnerActive) {
      this.spinner.text = message;
    }
  }

  succeedSpinner(message: string): void {
    if (this.spinnerActive) {
      this.spinnerActive = false;
      this.spinner.succeed(`${message} (${this.elapsed()}s)`);
    }
  }

  warnSpinner(message: string): void {
    if (this.spinnerActive) {
      this.spinnerActive = false;
      this.spinner.warn(`${message} (${this.elapsed()}s)`);
    }
  }

  failSpinner(message: string): void {
    if (this.spinnerActive) {
      this.spinnerActive = false;
      this.spinner.fail(`${message} (${this.elapsed()}s)`);
    }
  }

  /**
   * Log key/value pairs in a formatted way
   */
  logMetrics(label: string, metrics: Record<string, string | number>): void {
    this.log(chalk.cyan(`📏 ${label}:`));
    Object.entries(metrics).forEach(([key, value]) => {
      this.log(chalk.cyan(`   ${key}: ${value}`));
    });
  }

  private elapsed(): string {
    return ((performance.now() - this.spinnerStartTime) / 1000).toFixed(1);
  }

  // Keep a running spinner on its own line
  private write(message: string): void {
    if (this.spinner.isSpinning) {
      this.spinner.clear();
      console.log(message);
      this.spinner.render();
    } else {
      console.log(message);
    }
  }
}
