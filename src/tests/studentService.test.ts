// src/tests/studentService.test.ts
import { MemoryStudentStore } from "../storage/MemoryStudentStore";
import {
  addStudent,
  deleteStudent,
  listStudents,
  resetStudents,
  updateStudentMarks,
} from "../services/studentService";
import { DuplicateKeyError, NotFoundError, ValidationError } from "../lib/errors";

const seeded = (...records: Array<{ name: string; roll_no: string; marks: number; grade: string }>) =>
  new MemoryStudentStore(JSON.stringify(records, null, 4));

describe("addStudent", () => {
  it("adds to empty storage with a computed grade", () => {
    const store = new MemoryStudentStore();

    const student = addStudent(store, { name: "Alice", roll_no: "R1", marks: 95 });

    expect(student).toEqual({ name: "Alice", roll_no: "R1", marks: 95, grade: "A" });
    expect(store.load()).toEqual([{ name: "Alice", roll_no: "R1", marks: 95, grade: "A" }]);
  });

  it("rejects a duplicate roll number and leaves storage byte-for-byte unchanged", () => {
    const store = seeded({ name: "Alice", roll_no: "R1", marks: 95, grade: "A" });
    const before = store.snapshot();

    expect(() => addStudent(store, { name: "Bob", roll_no: "R1", marks: 70 })).toThrow(
      DuplicateKeyError
    );
    expect(store.snapshot()).toBe(before);
    expect(store.load()).toHaveLength(1);
  });

  it("trims name and roll number", () => {
    const store = new MemoryStudentStore();
    const student = addStudent(store, { name: "  Cara ", roll_no: " R7 ", marks: 81 });
    expect(student).toEqual({ name: "Cara", roll_no: "R7", marks: 81, grade: "B" });
  });

  it.each([
    [{ name: "", roll_no: "R1", marks: 50 }],
    [{ name: "Ann", roll_no: "   ", marks: 50 }],
    [{ name: "Ann", roll_no: "R1", marks: -1 }],
    [{ name: "Ann", roll_no: "R1", marks: 100.5 }],
    [{ name: "Ann", roll_no: "R1", marks: Number.NaN }],
  ])("rejects invalid input %p without writing", (input) => {
    const store = new MemoryStudentStore();
    expect(() => addStudent(store, input)).toThrow(ValidationError);
    expect(store.snapshot()).toBeNull();
  });

  it("keeps roll numbers unique across a sequence of adds", () => {
    const store = new MemoryStudentStore();
    for (const roll of ["R1", "R2", "R1", "R3", "R2"]) {
      try {
        addStudent(store, { name: "X", roll_no: roll, marks: 50 });
      } catch (err) {
        expect(err).toBeInstanceOf(DuplicateKeyError);
      }
    }
    expect(listStudents(store).map((s) => s.roll_no)).toEqual(["R1", "R2", "R3"]);
  });
});

describe("updateStudentMarks", () => {
  it("updates marks and regrades", () => {
    const store = seeded({ name: "Alice", roll_no: "R1", marks: 95, grade: "A" });

    const updated = updateStudentMarks(store, "R1", 65);

    expect(updated).toEqual({ name: "Alice", roll_no: "R1", marks: 65, grade: "D" });
    expect(store.load()).toEqual([updated]);
  });

  it("rejects out-of-range marks and keeps the stored value", () => {
    const store = seeded({ name: "Alice", roll_no: "R1", marks: 95, grade: "A" });

    expect(() => updateStudentMarks(store, "R1", 105)).toThrow(ValidationError);
    expect(store.load()[0].marks).toBe(95);
  });

  it("signals not found for an unknown roll number", () => {
    const store = seeded({ name: "Alice", roll_no: "R1", marks: 95, grade: "A" });
    const before = store.snapshot();

    expect(() => updateStudentMarks(store, "R404", 50)).toThrow(NotFoundError);
    expect(store.snapshot()).toBe(before);
  });
});

describe("deleteStudent", () => {
  it("removes the matching record", () => {
    const store = seeded(
      { name: "Alice", roll_no: "R1", marks: 95, grade: "A" },
      { name: "Bob", roll_no: "R2", marks: 55, grade: "F" }
    );

    expect(deleteStudent(store, "R1")).toBe(1);
    expect(store.load()).toEqual([{ name: "Bob", roll_no: "R2", marks: 55, grade: "F" }]);
  });

  it("signals not found and leaves storage unchanged", () => {
    const store = seeded({ name: "Alice", roll_no: "R1", marks: 95, grade: "A" });
    const before = store.snapshot();

    expect(() => deleteStudent(store, "R9")).toThrow(NotFoundError);
    expect(store.snapshot()).toBe(before);
  });
});

describe("records sharing a roll number", () => {
  const twice = () =>
    seeded(
      { name: "First", roll_no: "R1", marks: 40, grade: "F" },
      { name: "Second", roll_no: "R1", marks: 50, grade: "F" }
    );

  it("updateStudentMarks changes only the first match", () => {
    const store = twice();

    updateStudentMarks(store, "R1", 95);

    expect(store.load()).toEqual([
      { name: "First", roll_no: "R1", marks: 95, grade: "A" },
      { name: "Second", roll_no: "R1", marks: 50, grade: "F" },
    ]);
  });

  it("deleteStudent removes every match", () => {
    const store = twice();

    expect(deleteStudent(store, "R1")).toBe(2);
    expect(store.snapshot()).toBe("[]");
  });
});

describe("roll number lookups", () => {
  it("trim surrounding whitespace like addStudent does", () => {
    const store = seeded(
      { name: "Alice", roll_no: "R1", marks: 95, grade: "A" },
      { name: "Bob", roll_no: "R2", marks: 55, grade: "F" }
    );

    expect(updateStudentMarks(store, " R1 ", 81)).toEqual({
      name: "Alice",
      roll_no: "R1",
      marks: 81,
      grade: "B",
    });
    expect(deleteStudent(store, "R2\t")).toBe(1);
    expect(store.load().map((s) => s.roll_no)).toEqual(["R1"]);
  });
});

describe("resetStudents", () => {
  it("clears everything and reports how many went", () => {
    const store = seeded(
      { name: "Alice", roll_no: "R1", marks: 95, grade: "A" },
      { name: "Bob", roll_no: "R2", marks: 55, grade: "F" }
    );

    expect(resetStudents(store)).toBe(2);
    expect(store.snapshot()).toBe("[]");
  });
});
