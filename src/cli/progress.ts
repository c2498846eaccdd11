/**
 * svgpicture ProgressReporter
 *
 * Structured console output for CLI operations. `quiet` drops everything
 * except failures and warnings.
 */

export class ProgressReporter {
  constructor(private readonly quiet: boolean = false) {}

  startTask(name: string): void {
    if (!this.quiet) console.log(`⏳ ${name}...`);
  }

  completeTask(name: string, durationMs?: number): void {
    if (this.quiet) return;
    console.log(durationMs === undefined ? `✅ ${name}` : `✅ ${name} (${durationMs}ms)`);
  }

  failTask(name: string, err: Error): void {
    console.error(`❌ ${name}: ${err.message}`);
  }

  logInfo(message: string): void {
    if (!this.quiet) console.log(`ℹ️  ${message}`);
  }

  warn(message: string): void {
    console.warn(`⚠️  ${message}`);
  }
}
