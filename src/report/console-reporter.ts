/**
 * Console Reporter - coloured, human-readable findings.
 */

import chalk, { Chalk, type ChalkInstance } from 'chalk';
import { formatMatch } from '../scanner/redactor.js';
import type { ItemFindings, SourceSummary, SweepReporter } from '../sweep/types.js';

export interface ConsoleReporterOptions {
  /** Print matches verbatim instead of redacted. */
  showContent: boolean;
  /** Disable ANSI colours. Default: auto-detected */
  color?: boolean;
  /** Output sink. Default: stdout */
  write?: (line: string) => void;
}

export class ConsoleReporter implements SweepReporter {
  private readonly showContent: boolean;
  private readonly c: ChalkInstance;
  private readonly write: (line: string) => void;

  constructor(options: ConsoleReporterOptions) {
    this.showContent = options.showContent;
    this.c = options.color === false ? new Chalk({ level: 0 }) : chalk;
    this.write = options.write ?? (line => process.stdout.write(`${line}\n`));
  }

  sourceStart(label: string): void {
    this.write(this.c.bold(`Processing ${label}...`));
  }

  item(findings: ItemFindings): void {
    for (const line of this.renderItem(findings)) {
      this.write(line);
    }
  }

  sourceComplete(summary: SourceSummary): void {
    this.write(this.renderSummary(summary));
    this.write('');
  }

  sourceFailed(summary: SourceSummary): void {
    this.write(this.c.red(`✖ ${summary.label}: ${summary.error ?? 'listing failed'}`));
    this.write('');
  }

  /** Lines printed for one resource with findings. */
  renderItem({ item, findings }: ItemFindings): string[] {
    const lines = [this.c.cyan.bold(`${item.title}: ${item.resource}`)];
    let lastDetail: string | null = null;

    for (const { target, matches } of findings) {
      if (target.detail) {
        const detail = `${target.detail.name}: ${target.detail.value}`;
        if (detail !== lastDetail) {
          lines.push(this.c.cyanBright(detail));
          lastDetail = detail;
        }
      }

      for (const [patternName, matched] of Object.entries(matches)) {
        for (const value of matched) {
          lines.push(this.c.green.bold(`Pattern: ${patternName}`));
          lines.push(this.c.yellow(`Matched Data: ${formatMatch(value, this.showContent)}`));
        }
      }
    }

    lines.push('');
    return lines;
  }

  renderSummary(summary: SourceSummary): string {
    const text = `${summary.label}: ${summary.collected}/${summary.listed} scanned, ` +
      `${summary.itemsWithFindings} with findings, ${summary.failed} failed`;
    return summary.itemsWithFindings > 0 ? this.c.yellow(text) : this.c.green(`✔ ${text}`);
  }
}

export default ConsoleReporter;
