// src/app.ts
import express, { Express } from "express";
import cors from "cors";
import helmet from "helmet";
import rateLimit from "express-rate-limit";
import config from "./config/config";
import { errorHandler } from "./middleware/errorHandler";
import type { StudentStore } from "./storage/StudentStore";

// Routes
import { createStudentsRouter } from "./routes/students";

export interface AppOptions {
  store: StudentStore;
  uploadsPerHour?: number;
}

export function createApp({ store, uploadsPerHour = 50 }: AppOptions): Express {
  const app = express();

  // Security & Performance Middleware
  app.use(helmet());
  app.use(
    cors({
      origin: config.frontendUrl,
      credentials: true,
    })
  );

  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: true, limit: "1mb" }));

  app.use(
    "/students/upload",
    rateLimit({
      windowMs: 60 * 60 * 1000,
      max: uploadsPerHour,
      standardHeaders: true,
      legacyHeaders: false,
      message: { success: false, message: "Too many uploads. Please try again later." },
    })
  );

  // Health check
  app.get("/health", (req, res) => {
    res.status(200).json({
      status: "OK",
      app: config.appName,
      storage: store.describe(),
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  // API Routes
  app.use("/students", createStudentsRouter(store));

  app.use((req, res) => {
    res.status(404).json({
      message: `Route ${req.originalUrl} not found`,
      method: req.method,
    });
  });

  // Global error handler
  app.use(errorHandler);

  return app;
}
