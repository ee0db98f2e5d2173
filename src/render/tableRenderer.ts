import chalk from "chalk";
import Table from "cli-table3";
import { ExtractedRecord } from "../types";
import { BaseRenderer } from "./baseRenderer";

export type ColorLevel = 0 | 1 | 2 | 3;

export interface TableRendererOptions {
  color: boolean;
  /** Forces a colour depth instead of the one chalk detects for the terminal. */
  colorLevel?: ColorLevel;
}

/**
 * Headerless single-column table with two rows per record: the title in bold
 * black on yellow, then the link in yellow.
 */
export class TableRenderer extends BaseRenderer {
  private readonly chalk: chalk.Chalk;

  constructor(options: TableRendererOptions) {
    super();
    if (!options.color) {
      this.chalk = new chalk.Instance({ level: 0 });
    } else {
      this.chalk = options.colorLevel === undefined ? chalk : new chalk.Instance({ level: options.colorLevel });
    }
  }

  render(records: readonly ExtractedRecord[]): string {
    if (records.length === 0) {
      return "";
    }

    // Border styling is left to us; cli-table3 would otherwise colour it on its own.
    const table = new Table({ style: { head: [], border: [] } });
    for (const record of records) {
      table.push([this.chalk.black.bgYellow.bold(record.title)]);
      table.push([this.chalk.yellow(record.url)]);
    }
    return `${table.toString()}\n`;
  }
}
