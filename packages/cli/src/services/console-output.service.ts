import chalk from "chalk";
import ora from "ora";
import type { IOutputService, ResultStatus } from "../interfaces/output.interface";

const STATUS_ICONS: Record<ResultStatus, string> = {
  pass: chalk.green("✓"),
  fail: chalk.red("✗"),
  warn: chalk.yellow("⚠"),
  skip: chalk.gray("—"),
};

const STATUS_COLORS: Record<ResultStatus, chalk.Chalk> = {
  pass: chalk.green,
  fail: chalk.red,
  warn: chalk.yellow,
  skip: chalk.gray,
};

/**
 * IOutputService over chalk and ora, writing to stdout.
 */
export class ConsoleOutputService implements IOutputService {
  private spinner?: ora.Ora;

  header(title: string, icon?: string): void {
    console.log(chalk.blue.bold(icon ? `${icon} ${title}` : title));
  }

  info(message: string): void {
    this.print(chalk.white(message));
  }

  success(message: string): void {
    this.print(chalk.green(message));
  }

  warn(message: string): void {
    this.print(chalk.yellow(message));
  }

  error(message: string): void {
    this.print(chalk.red(message));
  }

  dim(message: string): void {
    this.print(chalk.gray(message));
  }

  newline(): void {
    this.print("");
  }

  table(rows: Array<[string, string]>): void {
    const width = Math.max(0, ...rows.map(([label]) => label.length));
    for (const [label, value] of rows) {
      this.print(`  ${chalk.gray(label.padEnd(width))}  ${chalk.cyan(value)}`);
    }
  }

  result(status: ResultStatus, message: string): void {
    this.print(`${STATUS_ICONS[status]} ${STATUS_COLORS[status](message)}`);
  }

  startSpinner(message: string): void {
    this.spinner?.stop();
    this.spinner = ora(message).start();
  }

  succeedSpinner(message?: string): void {
    this.spinner?.succeed(message);
    this.spinner = undefined;
  }

  failSpinner(message?: string): void {
    this.spinner?.fail(message);
    this.spinner = undefined;
  }

  stopSpinner(): void {
    this.spinner?.stop();
    this.spinner = undefined;
  }

  /**
   * Lines written while a spinner runs would be overdrawn; clear it first
   * and redraw it afterwards.
   */
  private print(line: string): void {
    if (this.spinner?.isSpinning) {
      this.spinner.clear();
      console.log(line);
      this.spinner.render();
      return;
    }
    console.log(line);
  }
}
