// src/scripts/backfillGrades.ts
import openStudentStore from "../config/db";
import type { StudentStore, StoreLoadReport } from "../storage/StudentStore";

export const backfillStoredGrades = (store: StudentStore): StoreLoadReport => {
  console.log(`Checking student records in ${store.describe()}...`);

  // a load pass rewrites the file when anything needed fixing
  const report = store.loadWithReport();

  if (report.recovered) {
    console.warn("⚠️ Data file could not be parsed; it was left untouched.");
  }
  console.log(`🛠️ Backfilled ${report.repaired} record(s).`);
  console.log(`🗑️ Dropped ${report.discarded} unreadable record(s).`);
  console.log(`✅ ${report.records.length} record(s) in good shape.`);
  return report;
};

if (require.main === module) {
  try {
    const report = backfillStoredGrades(openStudentStore());
    process.exit(report.recovered ? 1 : 0);
  } catch (err) {
    console.error(err);
    process.exit(1);
  }
}
