// src/services/studentService.ts
import {
  buildStudent,
  isValidMarks,
  MAX_MARKS,
  MIN_MARKS,
  type NewStudentInput,
  type StudentRecord,
} from "../models/Student";
import type { StudentStore } from "../storage/StudentStore";
import { DuplicateKeyError, NotFoundError, ValidationError } from "../lib/errors";

function assertMarks(marks: number): void {
  if (!isValidMarks(marks)) {
    throw new ValidationError(`Marks must be between ${MIN_MARKS} and ${MAX_MARKS}.`, {
      marks,
    });
  }
}

export function listStudents(store: StudentStore): StudentRecord[] {
  return store.load();
}

export function addStudent(store: StudentStore, input: NewStudentInput): StudentRecord {
  const name = input.name.trim();
  const rollNo = input.roll_no.trim();
  if (!name || !rollNo) throw new ValidationError("Please fill in all fields.");
  assertMarks(input.marks);

  const students = store.load();
  if (students.some((s) => s.roll_no === rollNo)) {
    throw new DuplicateKeyError(rollNo);
  }

  const student = buildStudent(name, rollNo, input.marks);
  students.push(student);
  store.save(students);
  return student;
}

// Only the first match is touched; roll numbers are unique after every write
export function updateStudentMarks(
  store: StudentStore,
  rollNo: string,
  marks: number
): StudentRecord {
  assertMarks(marks);
  const key = rollNo.trim();

  const students = store.load();
  const index = students.findIndex((s) => s.roll_no === key);
  if (index === -1) throw new NotFoundError(key);

  const updated = buildStudent(students[index].name, key, marks);
  students[index] = updated;
  store.save(students);
  return updated;
}

/** Removes every record carrying `rollNo` and returns how many went. */
export function deleteStudent(store: StudentStore, rollNo: string): number {
  const key = rollNo.trim();
  const students = store.load();
  const remaining = students.filter((s) => s.roll_no !== key);
  const removed = students.length - remaining.length;
  if (removed === 0) throw new NotFoundError(key);

  store.save(remaining);
  return removed;
}

export function resetStudents(store: StudentStore): number {
  const cleared = store.load().length;
  store.save([]);
  return cleared;
}
