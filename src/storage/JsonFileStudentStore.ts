// src/storage/JsonFileStudentStore.ts
import fs from "fs";
import { StudentStore } from "./StudentStore";

export class JsonFileStudentStore extends StudentStore {
  constructor(readonly filePath: string) {
    super();
  }

  describe(): string {
    return this.filePath;
  }

  protected readRaw(): string | null {
    if (!fs.existsSync(this.filePath)) return null;
    return fs.readFileSync(this.filePath, "utf-8");
  }

  protected writeRaw(contents: string): void {
    fs.writeFileSync(this.filePath, contents, "utf-8");
  }
}
