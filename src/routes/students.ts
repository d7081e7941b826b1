// src/routes/students.ts
import { Router, Request, Response } from "express";
import { asyncHandler } from "../middleware/asyncHandler";
import { uploadStudentsFile } from "../middleware/upload";
import { toMarks } from "../models/Student";
import type { StudentStore } from "../storage/StudentStore";
import {
  addStudent,
  deleteStudent,
  listStudents,
  resetStudents,
  updateStudentMarks,
} from "../services/studentService";
import { importStudentsFromBuffer } from "../services/studentImporter";
import { computeStatistics } from "../services/statistics";
import {
  exportStudentsToCsv,
  exportStudentsToExcel,
  importTemplateCsv,
} from "../helpers/exportHelpers";
import { ValidationError } from "../lib/errors";

const XLSX_MIME = "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";

function bodyField(req: Request, key: string): unknown {
  const body: unknown = req.body;
  if (typeof body !== "object" || body === null) return undefined;
  return new Map<string, unknown>(Object.entries(body)).get(key);
}

function marksFromBody(req: Request): number {
  const marks = toMarks(bodyField(req, "marks"));
  if (marks === null) throw new ValidationError("Marks must be a number.");
  return marks;
}

function textFromBody(req: Request, key: string): string {
  const value = bodyField(req, key);
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return "";
}

export function createStudentsRouter(store: StudentStore): Router {
  const router = Router();

  // GET all students
  router.get(
    "/",
    asyncHandler(async (req: Request, res: Response) => {
      const students = listStudents(store);
      res.json({ students, count: students.length });
    })
  );

  // GET summary for the dashboard chart
  router.get(
    "/stats",
    asyncHandler(async (req: Request, res: Response) => {
      const stats = computeStatistics(listStudents(store));
      if (!stats.hasData) {
        return res.json({ ...stats, message: "No data to show." });
      }
      res.json(stats);
    })
  );

  router.get(
    "/export",
    asyncHandler(async (req: Request, res: Response) => {
      const csv = exportStudentsToCsv(listStudents(store));
      res
        .header("Access-Control-Expose-Headers", "Content-Disposition")
        .attachment("students_data.csv")
        .send(csv);
    })
  );

  router.get(
    "/export/xlsx",
    asyncHandler(async (req: Request, res: Response) => {
      const workbook = await exportStudentsToExcel(listStudents(store));
      res
        .header("Content-Type", XLSX_MIME)
        .header("Access-Control-Expose-Headers", "Content-Disposition")
        .attachment("students_data.xlsx")
        .send(workbook);
    })
  );

  router.get(
    "/template",
    asyncHandler(async (req: Request, res: Response) => {
      res.attachment("students_template.csv").send(importTemplateCsv());
    })
  );

  // ADD one student
  router.post(
    "/",
    asyncHandler(async (req: Request, res: Response) => {
      const student = addStudent(store, {
        name: textFromBody(req, "name"),
        roll_no: textFromBody(req, "roll_no"),
        marks: marksFromBody(req),
      });
      console.log(`Student ${student.roll_no} added`);
      res.status(201).json({ message: "Student added successfully.", student });
    })
  );

  // BULK import from CSV / Excel
  router.post(
    "/upload",
    uploadStudentsFile.single("file"),
    asyncHandler(async (req: Request, res: Response) => {
      if (!req.file) throw new ValidationError("No file uploaded");

      const result = importStudentsFromBuffer(store, req.file.buffer, req.file.originalname);
      res.json({
        message: `File processed. Added: ${result.added}, Skipped (duplicates): ${result.skipped}`,
        ...result,
      });
    })
  );

  router.patch(
    "/:rollNo/marks",
    asyncHandler(async (req: Request, res: Response) => {
      const student = updateStudentMarks(store, req.params.rollNo, marksFromBody(req));
      res.json({ message: "Marks updated successfully.", student });
    })
  );

  // RESET all data
  router.delete(
    "/",
    asyncHandler(async (req: Request, res: Response) => {
      const cleared = resetStudents(store);
      console.log(`All student data cleared (${cleared} records)`);
      res.json({ message: "All student data cleared.", cleared });
    })
  );

  router.delete(
    "/:rollNo",
    asyncHandler(async (req: Request, res: Response) => {
      const removed = deleteStudent(store, req.params.rollNo);
      res.json({ message: "Student deleted.", removed });
    })
  );

  return router;
}
