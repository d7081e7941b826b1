// src/tests/gradeCalculator.test.ts
import { calculateGrade, GRADES, isGrade } from "../services/gradeCalculator";

describe("calculateGrade", () => {
  it.each([
    [100, "A"],
    [90, "A"],
    [89.99, "B"],
    [80, "B"],
    [79.99, "C"],
    [70, "C"],
    [69.99, "D"],
    [60, "D"],
    [59.99, "F"],
    [0, "F"],
  ])("grades %p as %s", (marks, grade) => {
    expect(calculateGrade(marks)).toBe(grade);
  });

  it("is total over numbers outside 0-100", () => {
    expect(calculateGrade(150)).toBe("A");
    expect(calculateGrade(-5)).toBe("F");
    expect(calculateGrade(Number.NaN)).toBe("F");
  });

  it("always returns one of the known grades", () => {
    for (let m = -10; m <= 110; m += 0.5) {
      expect(GRADES).toContain(calculateGrade(m));
    }
  });
});

describe("isGrade", () => {
  it("accepts only single known letters", () => {
    expect(isGrade("A")).toBe(true);
    expect(isGrade("F")).toBe(true);
    expect(isGrade("E")).toBe(false);
    expect(isGrade("a")).toBe(false);
    expect(isGrade(undefined)).toBe(false);
  });
});
