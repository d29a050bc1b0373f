import type { FailureCategory, FailureRecord, SyncTask } from "../types/index.js";

/**
 * Append-only record of everything that went wrong during a run
 */
export class FailureLedger {
  private readonly records: FailureRecord[] = [];

  append(record: FailureRecord): FailureRecord {
    const frozen = Object.freeze({ ...record });
    this.records.push(frozen);
    return frozen;
  }

  appendTaskFailure(task: SyncTask, message: string): FailureRecord {
    return this.append({
      id: task.id,
      shortName: task.shortName,
      group: task.group,
      category: task.kind,
      message,
      attempt: task.attempts,
    });
  }

  entries(): readonly FailureRecord[] {
    return this.records;
  }

  byCategory(category: FailureCategory): FailureRecord[] {
    return this.records.filter((record) => record.category === category);
  }

  get size(): number {
    return this.records.length;
  }
}
