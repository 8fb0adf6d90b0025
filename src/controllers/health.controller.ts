import { Request, Response } from "express";
import { AppDataSource } from "../config/db";

export const health = (req: Request, res: Response) => {
  res.json({
    status: "ok",
    service: "judge-service",
    database: AppDataSource.isInitialized ? "connected" : "disconnected",
    timestamp: new Date().toISOString(),
  });
};
