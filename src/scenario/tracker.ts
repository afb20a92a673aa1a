// In-memory result store for one scenario run; nothing is persisted.
import type { StepResult } from './types.js';

export class ResultsTracker {
  private results: StepResult[] = [];

  record(result: StepResult): void {
    this.results.push(result);
  }

  getPassCount(): number {
    return this.results.filter(r => r.status === 'passing').length;
  }

  getFailCount(): number {
    return this.results.filter(r => r.status === 'failing').length;
  }

  getFailing(): StepResult[] {
    return this.results.filter(r => r.status === 'failing');
  }

  getAll(): StepResult[] {
    return [...this.results];
  }

  summary(): string {
    return `${this.getPassCount()} passed, ${this.getFailCount()} failed`;
  }
}
