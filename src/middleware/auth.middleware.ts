import { Request, Response, NextFunction } from "express";
import { verifyJwt } from "../utils/jwt.util";
import { errorMessage } from "../utils/error.util";
import logger from "../utils/logger";

export const checkAuth = (req: Request, res: Response, next: NextFunction) => {
  const authHeader = req.headers.authorization;
  if (!authHeader || !authHeader.startsWith("Bearer ")) {
    res.status(401).json({ message: "Missing or invalid Authorization header" });
    return;
  }

  try {
    const user = verifyJwt(authHeader.slice("Bearer ".length));
    req.user = user;
    logger.debug(`🔐 [AUTH] ${req.method} ${req.path} as ${user.role} ${user.id}`);
    next();
  } catch (err) {
    logger.warn(`❌ [AUTH] Token verification failed: ${errorMessage(err)}`);
    res.status(403).json({ message: "Forbidden: Invalid or expired token" });
  }
};
