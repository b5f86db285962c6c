import ansis from "ansis";
import type { Config } from "../types";

export class Logger {
  private readonly config: Config;

  constructor(config: Config = {}) {
    this.config = {
      dryRun: false,
      quiet: false,
      ...config,
    };
  }

  /** Echo a command line before it runs. Dry runs always echo. */
  command(text: string): void {
    if (this.config.quiet && !this.config.dryRun) {
      return;
    }
    for (const line of text.split("\n")) {
      console.error(ansis.bold(line));
    }
  }

  print(message: string): void {
    console.log(message);
  }

  warn(message: string): void {
    console.warn(`${ansis.yellow("⚠")} ${message}`);
  }

  error(message: string): void {
    const lines = message.split("\n");
    for (const line of lines) {
      if (!line.trim()) {
        continue;
      }
      console.error(`${ansis.red("error")}: ${line}`);
    }
  }
}
