import Table from 'cli-table3';
import pc from 'picocolors';
import type { BuildProgress } from '@logkb/knowledge';

/**
 * Prints command results either as a single JSON document (`--json`) or as
 * human-readable lines. In JSON mode nothing but the result reaches stdout.
 */
export class OutputRenderer {
  constructor(private readonly isJson: boolean) {}

  get json(): boolean {
    return this.isJson;
  }

  render<T>(data: T, human: (data: T) => void): void {
    if (this.isJson) {
      console.log(JSON.stringify(data, null, 2));
    } else {
      human(data);
    }
  }

  success(message: string): void {
    console.log(`${pc.green('✔')} ${message}`);
  }

  line(message = ''): void {
    console.log(message);
  }

  hint(message: string): void {
    console.log(pc.dim(message));
  }

  table(rows: Array<[string, string | number]>, head: [string, string]): void {
    const table = new Table({ head, colAligns: ['right', 'left'] });
    rows.forEach(([key, value]) => table.push([key, String(value)]));
    console.log(table.toString());
  }

  /** Build progress goes to stderr so it never mixes with results. */
  progress(progress: BuildProgress): void {
    if (this.isJson) return;
    const percent = String(progress.percent).padStart(3, ' ');
    console.error(pc.dim(`[${percent}%] ${progress.phase}: ${progress.message}`));
  }
}
