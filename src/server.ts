// src/server.ts
import { createApp } from "./app";
import openStudentStore from "./config/db";
import config from "./config/config";

const startServer = () => {
  try {
    // 1. Open the data file (the first load backfills any missing grades)
    const store = openStudentStore();
    const { records } = store.loadWithReport();
    console.log(`Loaded ${records.length} student record(s)`);

    // 2. Start listening
    const app = createApp({ store });
    app.listen(config.port, () => {
      console.log(`${config.appName} running on http://localhost:${config.port}`);
      console.log(`Frontend: ${config.frontendUrl}`);
      console.log(`Environment: ${process.env.NODE_ENV || "development"}`);
    });
  } catch (error) {
    console.error("Failed to start server:", error);
    process.exit(1);
  }
};

startServer();
