import type { ChangeKind, ChangeRecord } from './types.js';

/**
 * Added and modified paths of one run, in copy order. Every physical copy
 * appends exactly one record; nothing is deduplicated.
 */
export class UpdateManifest {
  private readonly addedFiles: string[] = [];
  private readonly modifiedFiles: string[] = [];
  private readonly records: ChangeRecord[] = [];

  record(kind: ChangeKind, path: string): ChangeRecord {
    const record: ChangeRecord = { kind, path };
    (kind === 'added' ? this.addedFiles : this.modifiedFiles).push(path);
    this.records.push(record);
    return record;
  }

  get added(): readonly string[] {
    return this.addedFiles;
  }

  get modified(): readonly string[] {
    return this.modifiedFiles;
  }

  get history(): readonly ChangeRecord[] {
    return this.records;
  }

  get size(): number {
    return this.records.length;
  }
}
