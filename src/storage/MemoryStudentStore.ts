/**
 * In-memory store: same parsing and backfill as the file store, no disk.
 * Pass the would-be file contents to start from existing data.
 */

import { StudentStore } from "./StudentStore";

export class MemoryStudentStore extends StudentStore {
  private contents: string | null;

  constructor(initialContents: string | null = null) {
    super();
    this.contents = initialContents;
  }

  describe(): string {
    return "memory store";
  }

  /** What a file store would have on disk right now. */
  snapshot(): string | null {
    return this.contents;
  }

  protected readRaw(): string | null {
    return this.contents;
  }

  protected writeRaw(contents: string): void {
    this.contents = contents;
  }
}
