// src/services/studentImporter.ts
import papa from "papaparse";
import * as XLSX from "xlsx";
import {
  buildStudent,
  IMPORT_COLUMNS,
  isValidMarks,
  toMarks,
  toText,
  type StudentRecord,
} from "../models/Student";
import type { StudentStore } from "../storage/StudentStore";
import { ImportReadError, ImportSchemaError } from "../lib/errors";

export interface RawTable {
  columns: string[];
  rows: unknown[][];
}

export interface ImportResult {
  total: number;        // data rows in the file
  added: number;
  skipped: number;      // roll number already stored, or repeated earlier in the file
  invalid: number;      // empty cells, non-numeric or out-of-range marks
  duplicates: string[]; // roll numbers of the skipped rows, in file order
}

const EXCEL_EXTENSIONS = [".xlsx", ".xls"];

function isExcelFile(filename: string): boolean {
  const lower = filename.toLowerCase();
  return EXCEL_EXTENSIONS.some((ext) => lower.endsWith(ext));
}

function parseCsv(buffer: Buffer): RawTable {
  const text = buffer.toString("utf-8").replace(/^\uFEFF/, "");
  const parsed = papa.parse<string[]>(text, {
    header: false,
    delimiter: ",",
    skipEmptyLines: true,
  });
  if (parsed.errors.length) {
    const first = parsed.errors[0];
    throw new ImportReadError(`CSV parse error on row ${(first.row ?? 0) + 1}: ${first.message}`);
  }

  const [header, ...rows] = parsed.data;
  if (!header) throw new ImportReadError("File is empty");
  return { columns: header, rows };
}

function parseWorkbook(buffer: Buffer): RawTable {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(buffer, { type: "buffer" });
  } catch (err) {
    throw new ImportReadError(err instanceof Error ? err.message : String(err));
  }

  const firstSheet = workbook.SheetNames[0];
  const sheet = firstSheet === undefined ? undefined : workbook.Sheets[firstSheet];
  if (!sheet) throw new ImportReadError("Workbook has no sheets");

  const [header, ...rows] = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: null,
    blankrows: false,
  });
  if (!header) throw new ImportReadError("File is empty");
  return { columns: header.map((cell) => (cell === null ? "" : String(cell))), rows };
}

/** Reads an uploaded CSV or Excel file into a header row plus data rows. */
export function parseStudentFile(buffer: Buffer, filename: string): RawTable {
  return isExcelFile(filename) ? parseWorkbook(buffer) : parseCsv(buffer);
}

/**
 * Turns the table into graded records. Rows with an empty required cell or
 * marks that are not a number in range are counted, not returned.
 */
export function extractStudentRows(table: RawTable): { students: StudentRecord[]; invalid: number } {
  const missing = IMPORT_COLUMNS.filter((c) => !table.columns.includes(c));
  if (missing.length) throw new ImportSchemaError(missing);

  const nameIdx = table.columns.indexOf("name");
  const rollIdx = table.columns.indexOf("roll_no");
  const marksIdx = table.columns.indexOf("marks");

  const students: StudentRecord[] = [];
  let invalid = 0;

  for (const row of table.rows) {
    const name = toText(row[nameIdx]);
    const rollNo = toText(row[rollIdx]);
    const marks = toMarks(row[marksIdx]);

    if (name === null || rollNo === null || marks === null || !isValidMarks(marks)) {
      invalid++;
      continue;
    }
    students.push(buildStudent(name, rollNo, marks));
  }

  return { students, invalid };
}

export function importStudentsFromBuffer(
  store: StudentStore,
  buffer: Buffer,
  filename: string
): ImportResult {
  const table = parseStudentFile(buffer, filename);
  const { students: incoming, invalid } = extractStudentRows(table);

  const existing = store.load();
  const seenRolls = new Set(existing.map((s) => s.roll_no));
  const result: ImportResult = {
    total: table.rows.length,
    added: 0,
    skipped: 0,
    invalid,
    duplicates: [],
  };

  // keep-first: a roll number repeated inside the file loses to its first row
  for (const student of incoming) {
    if (seenRolls.has(student.roll_no)) {
      result.skipped++;
      result.duplicates.push(student.roll_no);
      continue;
    }
    seenRolls.add(student.roll_no);
    existing.push(student);
    result.added++;
  }

  store.save(existing);
  console.log(
    `📥 Imported ${filename}: added ${result.added}, skipped ${result.skipped}, invalid ${result.invalid}`
  );
  return result;
}
