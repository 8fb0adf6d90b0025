import jwt, { JwtPayload, Secret } from "jsonwebtoken";
import { UserRole } from "../entities/user.entity";
import { HttpError } from "./error.util";

const JWT_SECRET: Secret = process.env.JWT_SECRET || "secret";

export interface AuthUser {
  id: string;
  role: UserRole;
}

const isRole = (value: unknown): value is UserRole =>
  Object.values(UserRole).some((role) => role === value);

export const verifyJwt = (token: string): AuthUser => {
  let decoded: string | JwtPayload;
  try {
    decoded = jwt.verify(token, JWT_SECRET);
  } catch {
    throw new HttpError(403, "Invalid or expired access token");
  }
  if (typeof decoded === "string" || typeof decoded.id !== "string" || !isRole(decoded.role)) {
    throw new HttpError(403, "Malformed access token");
  }
  return { id: decoded.id, role: decoded.role };
};
