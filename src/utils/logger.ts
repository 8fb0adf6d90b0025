import winston from "winston";
import path from "path";

const logDir = path.join(__dirname, "../../logs");
const isTest = process.env.NODE_ENV === "test";

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  silent: isTest,
  format: winston.format.combine(
    winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    winston.format.printf(({ level, message, timestamp }) => {
      return `[${timestamp}] ${level.toUpperCase()}: ${message}`;
    })
  ),
  transports: isTest
    ? [new winston.transports.Console()]
    : [
        new winston.transports.Console(),
        new winston.transports.File({ filename: path.join(logDir, "combined.log") }),
        new winston.transports.File({ filename: path.join(logDir, "errors.log"), level: "error" }),
      ],
});

export default logger;
