// src/tests/statistics.test.ts
import { computeStatistics } from "../services/statistics";
import { buildStudent } from "../models/Student";

describe("computeStatistics", () => {
  it("reports no data for an empty collection", () => {
    expect(computeStatistics([])).toEqual({ hasData: false });
  });

  it("counts, averages to two decimals, and sorts grades by label", () => {
    const stats = computeStatistics([
      buildStudent("Ann", "R1", 91),
      buildStudent("Ben", "R2", 55),
      buildStudent("Cy", "R3", 72),
      buildStudent("Di", "R4", 95),
    ]);

    expect(stats).toEqual({
      hasData: true,
      total: 4,
      averageMarks: 78.25,
      gradeDistribution: [
        { grade: "A", count: 2 },
        { grade: "C", count: 1 },
        { grade: "F", count: 1 },
      ],
    });
  });

  it("rounds repeating averages", () => {
    const stats = computeStatistics([
      buildStudent("Ann", "R1", 70),
      buildStudent("Ben", "R2", 70),
      buildStudent("Cy", "R3", 71),
    ]);
    expect(stats.hasData && stats.averageMarks).toBe(70.33);
  });

  it("gives a zero mean when every mark is zero, distinct from no data", () => {
    expect(computeStatistics([buildStudent("Zed", "R0", 0)])).toEqual({
      hasData: true,
      total: 1,
      averageMarks: 0,
      gradeDistribution: [{ grade: "F", count: 1 }],
    });
  });
});
