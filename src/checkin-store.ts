import { invariant } from './invariant.ts';
import { KeyedLock } from './keyed-lock.ts';
import type { CheckinRecord, Subject } from './types.ts';

/**
 * Append-only check-in histories keyed by subject. Every operation on a
 * subject runs inside that subject's critical section; subjects never share
 * one.
 */
export class CheckinStore {
  private readonly histories = new Map<Subject, CheckinRecord[]>();
  private readonly lock = new KeyedLock();
  private total = 0;

  async append(subject: Subject, record: CheckinRecord): Promise<void> {
    await this.lock.run(subject, () => {
      this.appendLocked(subject, record);
    });
  }

  /** Snapshot of every append that completed before this call. */
  async readAll(subject: Subject): Promise<readonly CheckinRecord[]> {
    return this.lock.run(subject, () => this.snapshot(subject));
  }

  /**
   * Append then read the full history as one unit, so the result always ends
   * with `record` even while other writers target the same subject.
   */
  async appendAndRead(subject: Subject, record: CheckinRecord): Promise<readonly CheckinRecord[]> {
    return this.lock.run(subject, () => {
      const stored = this.appendLocked(subject, record);
      const history = this.snapshot(subject);
      invariant(history[history.length - 1] === stored, 'appended check-in is not last in its history');
      return history;
    });
  }

  count(): number {
    return this.total;
  }

  subjects(): number {
    return this.histories.size;
  }

  private appendLocked(subject: Subject, record: CheckinRecord): CheckinRecord {
    const stored = Object.freeze({ ...record });
    const history = this.histories.get(subject);
    if (history) {
      history.push(stored);
    } else {
      this.histories.set(subject, [stored]);
    }
    this.total += 1;
    return stored;
  }

  private snapshot(subject: Subject): readonly CheckinRecord[] {
    return Object.freeze([...(this.histories.get(subject) ?? [])]);
  }
}
