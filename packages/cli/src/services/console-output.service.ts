import chalk from "chalk";
import ora from "ora";
import type { LogCallback, LogStream } from "@vpnkeeper/core";
import type { IOutputService } from "../interfaces/output.interface";

type Spinner = ReturnType<typeof ora>;

/**
 * Terminal output with chalk colours and an ora spinner.
 *
 * Progress lines replace the spinner text; in verbose mode they are also
 * kept on screen. Warnings from the engine (stderr) are always kept.
 */
export class ConsoleOutputService implements IOutputService {
  private spinner: Spinner | null = null;

  constructor(private readonly verbose = false) {}

  readonly log: LogCallback = (line: string, stream: LogStream) => {
    if (stream === "stderr") {
      this.persist(chalk.yellow(`  ⚠ ${line}`));
      return;
    }
    if (this.spinner) {
      this.spinner.text = line;
      if (this.verbose) this.persist(chalk.gray(`  ${line}`));
      return;
    }
    if (this.verbose) console.log(chalk.gray(`  ${line}`));
  };

  header(title: string, icon?: string): void {
    console.log(chalk.blue.bold(icon ? `${icon} ${title}` : title));
  }

  info(message: string): void {
    this.persist(chalk.cyan(message));
  }

  success(message: string): void {
    this.persist(chalk.green(`✓ ${message}`));
  }

  warn(message: string): void {
    this.persist(chalk.yellow(`⚠ ${message}`));
  }

  error(message: string, suggestions: string[] = []): void {
    this.stopSpinner();
    console.error(chalk.red("Error:"), message);
    for (const suggestion of suggestions) {
      console.error(chalk.gray(`  → ${suggestion}`));
    }
  }

  dim(message: string): void {
    this.persist(chalk.gray(message));
  }

  line(message: string): void {
    this.persist(message);
  }

  newline(): void {
    this.persist("");
  }

  startSpinner(text: string): void {
    this.stopSpinner();
    this.spinner = ora(text).start();
  }

  stopSpinner(): void {
    if (!this.spinner) return;
    this.spinner.stop();
    this.spinner = null;
  }

  /** Prints above the spinner without breaking its line. */
  private persist(text: string): void {
    if (!this.spinner) {
      console.log(text);
      return;
    }
    this.spinner.clear();
    console.log(text);
    this.spinner.render();
  }
}
