import { Verdict } from "../entities/submission.entity";
import { resolveOutcome, toNumber, verdictForStatus } from "../services/verdict.service";

describe("verdictForStatus", () => {
  it.each([
    [1, Verdict.PENDING],
    [2, Verdict.RUNNING],
    [3, Verdict.ACCEPTED],
    [4, Verdict.WRONG_ANSWER],
    [5, Verdict.TIME_LIMIT_EXCEEDED],
    [6, Verdict.COMPILATION_ERROR],
    [7, Verdict.RUNTIME_ERROR],
    [11, Verdict.RUNTIME_ERROR],
    [12, Verdict.RUNTIME_ERROR],
    [13, Verdict.INTERNAL_ERROR],
    [14, Verdict.RUNTIME_ERROR],
  ])("maps status %i to %s", (statusId, verdict) => {
    expect(verdictForStatus(statusId)).toBe(verdict);
  });

  it("treats unknown or missing ids as internal errors", () => {
    expect(verdictForStatus(99)).toBe(Verdict.INTERNAL_ERROR);
    expect(verdictForStatus(0)).toBe(Verdict.INTERNAL_ERROR);
    expect(verdictForStatus(null)).toBe(Verdict.INTERNAL_ERROR);
  });
});

describe("toNumber", () => {
  it("accepts numbers and numeric strings", () => {
    expect(toNumber(0.25)).toBe(0.25);
    expect(toNumber("0.125")).toBe(0.125);
  });

  it("falls back to zero for anything else", () => {
    expect(toNumber(null)).toBe(0);
    expect(toNumber(undefined)).toBe(0);
    expect(toNumber("fast")).toBe(0);
    expect(toNumber("")).toBe(0);
    expect(toNumber(Number.NaN)).toBe(0);
  });
});

describe("resolveOutcome", () => {
  it("converts seconds to milliseconds and keeps memory in KB", () => {
    const resolved = resolveOutcome({
      status: { id: 3, description: "Accepted" },
      time: "0.0456",
      memory: 3120.6,
      stdout: "42\n",
    });

    expect(resolved).toEqual({
      verdict: Verdict.ACCEPTED,
      statusId: 3,
      executionTimeMs: 46,
      memoryUsedKb: 3121,
      stdout: "42\n",
      stderr: "",
      compileOutput: "",
      message: "",
    });
  });

  it("resolves a malformed payload to an internal error with zeroed metrics", () => {
    const resolved = resolveOutcome({ status: { id: "3" }, time: "n/a", memory: undefined, stdout: 7 });

    expect(resolved.verdict).toBe(Verdict.INTERNAL_ERROR);
    expect(resolved.statusId).toBeNull();
    expect(resolved.executionTimeMs).toBe(0);
    expect(resolved.memoryUsedKb).toBe(0);
    expect(resolved.stdout).toBe("");
  });

  it("keeps the compiler output", () => {
    const resolved = resolveOutcome({ status: { id: 6 }, compile_output: "main.cpp:1: error" });
    expect(resolved.verdict).toBe(Verdict.COMPILATION_ERROR);
    expect(resolved.compileOutput).toBe("main.cpp:1: error");
  });
});
