// src/models/Student.ts
import { calculateGrade, isGrade, type Grade } from "../services/gradeCalculator";

export const MIN_MARKS = 0;
export const MAX_MARKS = 100;

export interface StudentRecord {
  name: string;
  roll_no: string; // primary key, unique across the collection
  marks: number;   // 0 - 100
  grade: Grade;    // always calculateGrade(marks)
}

export interface NewStudentInput {
  name: string;
  roll_no: string;
  marks: number;
}

// Column order of the persisted file, the CSV export and the import template
export const STUDENT_FIELDS = ["name", "roll_no", "marks", "grade"] as const;
export const IMPORT_COLUMNS = ["name", "roll_no", "marks"] as const;

export function isValidMarks(marks: number): boolean {
  return Number.isFinite(marks) && marks >= MIN_MARKS && marks <= MAX_MARKS;
}

export function buildStudent(name: string, rollNo: string, marks: number): StudentRecord {
  return { name, roll_no: rollNo, marks, grade: calculateGrade(marks) };
}

/** Trimmed text of a string or number cell; null when empty or of any other type. */
export function toText(value: unknown): string | null {
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  return trimmed === "" ? null : trimmed;
}

// Plain decimal literals only; Number() would also take "0x3C" or "0b1"
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)(e[+-]?\d+)?$/i;

/** Numeric value of a number or decimal string; null when it does not coerce. */
export function toMarks(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

export type StoredEntryResult =
  | { status: "ok"; record: StudentRecord; repaired: boolean }
  | { status: "discarded"; reason: string };

/**
 * Validates one entry read back from the data file.
 *
 * Numbers in `name`/`roll_no` are stringified, numeric strings in `marks` are
 * coerced, and a missing or stale `grade` is recomputed. Any of those counts
 * as a repair, as does dropping fields outside the record shape.
 */
export function reconcileStoredEntry(entry: unknown): StoredEntryResult {
  if (typeof entry !== "object" || entry === null || Array.isArray(entry)) {
    return { status: "discarded", reason: "entry is not an object" };
  }

  const fields = new Map<string, unknown>(Object.entries(entry));
  const name = toText(fields.get("name"));
  const rollNo = toText(fields.get("roll_no"));
  const marks = toMarks(fields.get("marks"));

  if (name === null) return { status: "discarded", reason: "missing name" };
  if (rollNo === null) return { status: "discarded", reason: "missing roll_no" };
  if (marks === null) return { status: "discarded", reason: "marks is not numeric" };
  if (!isValidMarks(marks)) {
    return { status: "discarded", reason: `marks ${marks} outside ${MIN_MARKS}-${MAX_MARKS}` };
  }

  const record = buildStudent(name, rollNo, marks);
  const storedGrade = fields.get("grade");

  const repaired =
    fields.get("name") !== name ||
    fields.get("roll_no") !== rollNo ||
    fields.get("marks") !== marks ||
    !isGrade(storedGrade) ||
    storedGrade !== record.grade ||
    fields.size !== STUDENT_FIELDS.length;

  return { status: "ok", record, repaired };
}
