// src/storage/StudentStore.ts
import { reconcileStoredEntry, type StudentRecord } from "../models/Student";

export interface StoreLoadReport {
  records: StudentRecord[];
  repaired: number;   // entries whose derived or coerced fields were rewritten
  discarded: number;  // entries that could not be read as a student record
  recovered: boolean; // the data was unreadable and treated as empty
}

/**
 * Whole-collection persistence for student records.
 *
 * Subclasses only move text in and out; parsing, load-time backfill and
 * serialization live here so every backend behaves the same. `readRaw`
 * returns null when nothing has been stored yet.
 */
export abstract class StudentStore {
  protected abstract readRaw(): string | null;
  protected abstract writeRaw(contents: string): void;

  /** Human-readable location for log lines. */
  abstract describe(): string;

  load(): StudentRecord[] {
    return this.loadWithReport().records;
  }

  loadWithReport(): StoreLoadReport {
    const raw = this.readRaw();
    if (raw === null) return { records: [], repaired: 0, discarded: 0, recovered: false };

    const entries = this.parse(raw);
    if (entries === null) return { records: [], repaired: 0, discarded: 0, recovered: true };

    const records: StudentRecord[] = [];
    let repaired = 0;
    let discarded = 0;

    for (const [index, entry] of entries.entries()) {
      const result = reconcileStoredEntry(entry);
      if (result.status === "discarded") {
        discarded++;
        console.warn(`⚠️ Dropping stored entry #${index} from ${this.describe()}: ${result.reason}`);
        continue;
      }
      if (result.repaired) repaired++;
      records.push(result.record);
    }

    // save back only if something changed
    if (repaired > 0 || discarded > 0) {
      console.log(
        `Backfilled ${repaired} record(s), dropped ${discarded} in ${this.describe()}`
      );
      this.save(records);
    }

    return { records, repaired, discarded, recovered: false };
  }

  save(records: StudentRecord[]): void {
    const ordered = records.map(({ name, roll_no, marks, grade }) => ({
      name,
      roll_no,
      marks,
      grade,
    }));
    this.writeRaw(JSON.stringify(ordered, null, 4));
  }

  private parse(raw: string): unknown[] | null {
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      console.warn(`⚠️ ${this.describe()} is not valid JSON (${reason}); treating as empty`);
      return null;
    }
    if (!Array.isArray(data)) {
      console.warn(`⚠️ ${this.describe()} does not hold an array; treating as empty`);
      return null;
    }
    return data;
  }
}
