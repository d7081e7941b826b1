// src/middleware/upload.ts
import multer from "multer";
import path from "path";
import config from "../config/config";
import { ImportReadError } from "../lib/errors";

const storage = multer.memoryStorage();

export const ALLOWED_UPLOAD_EXTENSIONS = [".csv", ".xlsx", ".xls"];

export const uploadStudentsFile = multer({
  storage,
  limits: { fileSize: config.uploadMaxBytes },
  fileFilter: (req, file, cb) => {
    const ext = path.extname(file.originalname).toLowerCase();
    if (!ALLOWED_UPLOAD_EXTENSIONS.includes(ext)) {
      return cb(new ImportReadError("Only CSV and Excel files allowed"));
    }
    cb(null, true);
  },
});
