import jwt from "jsonwebtoken";
import { AuthUser } from "../utils/jwt.util";

export const TEST_JWT_SECRET = process.env.JWT_SECRET || "secret";

export const signTestToken = (payload: AuthUser, expiresIn = 60 * 60) =>
  jwt.sign(payload, TEST_JWT_SECRET, { expiresIn });
