import { KeyedLock } from './keyed-lock.ts';
import type { ConsentRecord, Subject } from './types.ts';

/**
 * One current consent per subject. A put replaces the previous record
 * whole; there is no merge and no history.
 */
export class ConsentStore {
  private readonly records = new Map<Subject, ConsentRecord>();
  private readonly lock = new KeyedLock();

  async put(subject: Subject, record: ConsentRecord): Promise<void> {
    const frozen = Object.freeze({ ...record });
    await this.lock.run(subject, () => {
      this.records.set(subject, frozen);
    });
  }

  // Records are frozen before they are published, so reads skip the lock.
  get(subject: Subject): ConsentRecord | undefined {
    return this.records.get(subject);
  }

  count(): number {
    return this.records.size;
  }
}
