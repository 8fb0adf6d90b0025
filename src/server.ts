import "reflect-metadata";
import http from "http";
import { AppDataSource } from "./config/db";
import app from "./app";
import { initSocket } from "./utils/socket";
import logger from "./utils/logger";
import { errorMessage } from "./utils/error.util";

const PORT = process.env.PORT || 4000;

const server = http.createServer(app);
initSocket(server);

AppDataSource.initialize()
  .then(() => {
    server.listen(PORT, () => {
      logger.info(`${"=".repeat(60)}`);
      logger.info(`✅ DB Connected`);
      logger.info(`🚀 Judge Service running on port ${PORT}`);
      logger.info(`📘 Swagger Docs available at: http://localhost:${PORT}/api/docs`);
      logger.info(`💓 Health Check: http://localhost:${PORT}/health`);
      logger.info(`🛰️ Leaderboard WebSocket active on port ${PORT}`);
      logger.info(`${"=".repeat(60)}`);
    });
  })
  .catch((err: unknown) => {
    logger.error(`❌ Data Source initialization error: ${errorMessage(err)}`);
    process.exit(1);
  });
