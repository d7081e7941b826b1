// src/services/gradeCalculator.ts

export const GRADES = ["A", "B", "C", "D", "F"] as const;
export type Grade = (typeof GRADES)[number];

export interface GradeBand {
  grade: Grade;
  min: number; // inclusive lower bound
}

export const GRADING_SCALE: readonly GradeBand[] = [
  { grade: "A", min: 90 },
  { grade: "B", min: 80 },
  { grade: "C", min: 70 },
  { grade: "D", min: 60 },
];

const FAIL_GRADE: Grade = "F";

export function isGrade(value: unknown): value is Grade {
  return GRADES.some((g) => g === value);
}

/**
 * Letter grade for a numeric score. Total over all numbers: anything below
 * the lowest band, including NaN, is an F.
 */
export function calculateGrade(marks: number): Grade {
  const sortedScale = [...GRADING_SCALE].sort((a, b) => b.min - a.min);
  const matched = sortedScale.find((band) => marks >= band.min);
  return matched ? matched.grade : FAIL_GRADE;
}
