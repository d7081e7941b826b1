// src/services/statistics.ts
import type { StudentRecord } from "../models/Student";
import type { Grade } from "./gradeCalculator";

export interface GradeCount {
  grade: Grade;
  count: number;
}

export type StudentStatistics =
  | { hasData: false }
  | {
      hasData: true;
      total: number;
      averageMarks: number; // 2 decimal places
      gradeDistribution: GradeCount[]; // sorted by grade label
    };

export function computeStatistics(students: StudentRecord[]): StudentStatistics {
  if (students.length === 0) return { hasData: false };

  const sum = students.reduce((acc, s) => acc + s.marks, 0);
  const averageMarks = Number((sum / students.length).toFixed(2));

  const counts = new Map<Grade, number>();
  for (const s of students) {
    counts.set(s.grade, (counts.get(s.grade) ?? 0) + 1);
  }

  const gradeDistribution = [...counts.entries()]
    .map(([grade, count]) => ({ grade, count }))
    .sort((a, b) => a.grade.localeCompare(b.grade));

  return { hasData: true, total: students.length, averageMarks, gradeDistribution };
}
