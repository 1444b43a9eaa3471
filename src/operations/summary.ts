import type { ScrubOutcome } from '../types.js';

export const MACHINE_PREFIX = 'EXIFSWEEP_SUMMARY';

/**
 * Counters for one invocation. Dry-run "would scrub" entries only count
 * toward `total`.
 */
export class RunSummary {
  total = 0;
  scrubbed = 0;
  skipped = 0;
  errors = 0;
  duplicatesDeleted = 0;
  duplicatesMoved = 0;

  private readonly startedAt: number;

  constructor(private readonly clock: () => number = () => performance.now()) {
    this.startedAt = clock();
  }

  update(outcome: ScrubOutcome): void {
    this.total++;
    switch (outcome.kind) {
      case 'scrubbed':
        this.scrubbed++;
        break;
      case 'skipped':
        if (outcome.reason !== 'dry-run') this.skipped++;
        break;
      case 'error':
        this.errors++;
        break;
      case 'duplicate':
        if (outcome.quarantinePath !== undefined) this.duplicatesMoved++;
        else this.duplicatesDeleted++;
        break;
    }
  }

  durationSeconds(): number {
    return (this.clock() - this.startedAt) / 1000;
  }

  renderLines(): string[] {
    const lines = [
      'Summary:',
      `  Total JPEGs found        : ${this.total}`,
      `  Successfully scrubbed    : ${this.scrubbed}`,
      `  Skipped (unstable/temp)  : ${this.skipped}`,
      `  Errors                   : ${this.errors}`,
    ];
    if (this.duplicatesDeleted > 0) lines.push(`  Duplicates deleted       : ${this.duplicatesDeleted}`);
    if (this.duplicatesMoved > 0) lines.push(`  Duplicates moved         : ${this.duplicatesMoved}`);
    lines.push(`  Duration                 : ${this.durationSeconds().toFixed(2)}s`);
    return lines;
  }

  machineLine(): string {
    return [
      MACHINE_PREFIX,
      `total=${this.total}`,
      `scrubbed=${this.scrubbed}`,
      `skipped=${this.skipped}`,
      `errors=${this.errors}`,
      `duplicates_deleted=${this.duplicatesDeleted}`,
      `duplicates_moved=${this.duplicatesMoved}`,
      `duration=${this.durationSeconds().toFixed(3)}`,
    ].join(' ');
  }
}
