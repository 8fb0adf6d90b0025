import { Request, Response, NextFunction } from "express";
import { HttpError, errorMessage } from "../utils/error.util";
import logger from "../utils/logger";

interface BodyParserError extends Error {
  type?: string;
}

const isBodyParserError = (err: unknown): err is BodyParserError =>
  err instanceof Error && "type" in err;

/**
 * Last stop for anything a route did not answer itself.
 */
const errorMiddleware = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
  if (err instanceof SyntaxError && "body" in err) {
    res.status(400).json({ message: "Invalid JSON payload" });
    return;
  }
  if (isBodyParserError(err) && err.type === "entity.too.large") {
    res.status(413).json({ message: "Payload too large" });
    return;
  }
  if (err instanceof HttpError) {
    res.status(err.status).json({ message: err.message });
    return;
  }

  logger.error(`${req.method} ${req.url} | ${errorMessage(err)}`);
  res.status(500).json({ message: "Internal Server Error" });
};

export default errorMiddleware;
