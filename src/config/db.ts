// src/config/db.ts
import fs from "fs";
import path from "path";
import config from "./config";
import { JsonFileStudentStore } from "../storage/JsonFileStudentStore";

const openStudentStore = (dataFile: string = config.dataFile): JsonFileStudentStore => {
  const filePath = path.resolve(dataFile);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });

  const store = new JsonFileStudentStore(filePath);
  console.log(`✅ Student store ready at ${filePath}`);
  return store;
};

export default openStudentStore;
