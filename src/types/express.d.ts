import { AuthUser } from "../utils/jwt.util";

declare global {
  namespace Express {
    interface Request {
      user?: AuthUser;
    }
  }
}

export {};
