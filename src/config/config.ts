// src/config/config.ts
import dotenv from "dotenv";

dotenv.config();

const config = Object.freeze({
  port: Number(process.env.PORT) || 8000,
  dataFile: process.env.DATA_FILE || "students.json",
  frontendUrl: process.env.FRONTEND_URL || "http://localhost:3000",
  uploadMaxBytes: Number(process.env.UPLOAD_MAX_BYTES) || 10 * 1024 * 1024, // 10MB
  appName: process.env.APP_NAME || "Student Records",
});

export default config;
