import * as ExcelJS from "exceljs";
import papa from "papaparse";
import { IMPORT_COLUMNS, STUDENT_FIELDS, type StudentRecord } from "../models/Student";
import { toNodeBuffer } from "../lib/bufferUtils";

// Empty collection -> empty download
export function exportStudentsToCsv(students: StudentRecord[]): Buffer {
  if (students.length === 0) return Buffer.alloc(0);

  const csv = papa.unparse(students, {
    columns: [...STUDENT_FIELDS],
    newline: "\n",
  });
  return Buffer.from(`${csv}\n`, "utf-8");
}

export async function exportStudentsToExcel(students: StudentRecord[]): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet("Students");

  sheet.columns = [
    { header: "name", key: "name", width: 25 },
    { header: "roll_no", key: "roll_no", width: 15 },
    { header: "marks", key: "marks", width: 10 },
    { header: "grade", key: "grade", width: 8 },
  ];
  sheet.getRow(1).font = { bold: true };

  students.forEach((s) => {
    sheet.addRow({ name: s.name, roll_no: s.roll_no, marks: s.marks, grade: s.grade });
  });

  const buffer = await workbook.xlsx.writeBuffer();
  return toNodeBuffer(buffer);
}

/** Header-only CSV listing the columns an import file needs. */
export function importTemplateCsv(): Buffer {
  return Buffer.from(`${IMPORT_COLUMNS.join(",")}\n`, "utf-8");
}
