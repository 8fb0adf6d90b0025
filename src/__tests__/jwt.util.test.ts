import jwt from "jsonwebtoken";
import { UserRole } from "../entities/user.entity";
import { HttpError } from "../utils/error.util";
import { signTestToken, TEST_JWT_SECRET } from "../test-utils/auth";
import { verifyJwt } from "../utils/jwt.util";

describe("verifyJwt", () => {
  it("returns the id and role of a valid token", () => {
    const token = signTestToken({ id: "user-1", role: UserRole.MANAGER });
    expect(verifyJwt(token)).toEqual({ id: "user-1", role: UserRole.MANAGER });
  });

  it("rejects a token signed with another secret", () => {
    const token = jwt.sign({ id: "user-1", role: UserRole.USER }, "test-secret-other");
    expect(() => verifyJwt(token)).toThrow(new HttpError(403, "Invalid or expired access token"));
  });

  it("rejects a payload without a known role", () => {
    const token = signTestToken({ id: "user-1", role: UserRole.USER });
    const forged = jwt.sign({ ...jwt.decode(token, { json: true }), role: "ROOT" }, TEST_JWT_SECRET);
    expect(() => verifyJwt(forged)).toThrow("Malformed access token");
  });
});
