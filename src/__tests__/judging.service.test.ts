import { Language, Verdict } from "../entities/submission.entity";
import { CaseStatus } from "../entities/testCaseResult.entity";
import { JudgeCase, decideVerdict, judgeTestCases, sortByOrder } from "../services/judging.service";
import { accepted, compilationError, outcome, scriptedExecutor, unavailable, wrongAnswer } from "../test-utils/sandbox";

const cases = (count: number): JudgeCase[] =>
  Array.from({ length: count }, (_, i) => ({ id: `tc-${i + 1}`, order: i + 1, input: `${i + 1}`, expectedOutput: `${(i + 1) * 2}` }));

const limits = { timeLimitMs: 1500, memoryLimitMb: 128 };

describe("sortByOrder", () => {
  it("orders by `order` and keeps input position for ties", () => {
    const sorted = sortByOrder([
      { id: "a", order: 2 },
      { id: "b", order: 1 },
      { id: "c", order: 2 },
      { id: "d", order: 0 },
    ]);
    expect(sorted.map((c) => c.id)).toEqual(["d", "b", "a", "c"]);
  });
});

describe("judgeTestCases", () => {
  it("accepts when every case passes and reports the maxima", async () => {
    const sandbox = scriptedExecutor([accepted("2", "0.120", 2048), accepted("4", "0.300", 1024), accepted("6", "0.050", 4096)]);

    const summary = await judgeTestCases({ code: "x", language: Language.CPP, testCases: cases(3), limits, executor: sandbox.execute });

    expect(summary.state).toBe("COMPLETED");
    expect(summary.verdict).toBe(Verdict.ACCEPTED);
    expect(summary.testCasesPassed).toBe(3);
    expect(summary.totalTestCases).toBe(3);
    expect(summary.executionTime).toBe(300);
    expect(summary.memoryUsed).toBe(4096);
    expect(summary.errorMessage).toBe("");
  });

  it("sends limits in seconds and kilobytes", async () => {
    const sandbox = scriptedExecutor([accepted("2")]);

    await judgeTestCases({ code: "x", language: Language.C, testCases: cases(1), limits, executor: sandbox.execute });

    expect(sandbox.calls[0]).toEqual({
      sourceCode: "x",
      language: Language.C,
      stdin: "1",
      expectedOutput: "2",
      cpuTimeLimit: 1.5,
      memoryLimit: 131072,
    });
  });

  it("runs cases in order regardless of how they were given", async () => {
    const sandbox = scriptedExecutor([accepted("2"), accepted("4"), accepted("6")]);
    const [first, second, third] = cases(3);

    await judgeTestCases({
      code: "x",
      language: Language.JAVA,
      testCases: [third, first, second],
      limits,
      executor: sandbox.execute,
    });

    expect(sandbox.calls.map((c) => c.stdin)).toEqual(["1", "2", "3"]);
  });

  it("reports the first failing case's verdict while still running the rest", async () => {
    const sandbox = scriptedExecutor([accepted("2"), wrongAnswer("5"), outcome(5, { time: "2.001" })]);

    const summary = await judgeTestCases({ code: "x", language: Language.PYTHON, testCases: cases(3), limits, executor: sandbox.execute });

    expect(sandbox.calls).toHaveLength(3);
    expect(summary.verdict).toBe(Verdict.WRONG_ANSWER);
    expect(summary.testCasesPassed).toBe(1);
    expect(summary.results.map((r) => r.status)).toEqual([
      CaseStatus.ACCEPTED,
      CaseStatus.WRONG_ANSWER,
      CaseStatus.TIME_LIMIT_EXCEEDED,
    ]);
    expect(summary.executionTime).toBe(2001);
  });

  it("aborts on a compilation error and skips the remaining cases", async () => {
    const sandbox = scriptedExecutor([compilationError("error: expected ';'")]);

    const summary = await judgeTestCases({ code: "x", language: Language.CPP, testCases: cases(4), limits, executor: sandbox.execute });

    expect(sandbox.calls).toHaveLength(1);
    expect(summary.state).toBe("ABORTED");
    expect(summary.verdict).toBe(Verdict.COMPILATION_ERROR);
    expect(summary.compilationOutput).toBe("error: expected ';'");
    expect(summary.errorMessage).toBe("Compilation error");
    expect(summary.testCasesPassed).toBe(0);
    expect(summary.totalTestCases).toBe(4);
    expect(summary.results).toHaveLength(1);
    expect(summary.executionTime).toBeNull();
    expect(summary.memoryUsed).toBeNull();
  });

  it("turns a sandbox failure into a runtime error for that case and continues", async () => {
    const sandbox = scriptedExecutor([unavailable(), accepted("4")]);

    const summary = await judgeTestCases({ code: "x", language: Language.JAVASCRIPT, testCases: cases(2), limits, executor: sandbox.execute });

    expect(summary.verdict).toBe(Verdict.RUNTIME_ERROR);
    expect(summary.results[0].status).toBe(CaseStatus.RUNTIME_ERROR);
    expect(summary.results[0].errorMessage).toBe("Failed to execute code (execution timeout/unavailable)");
    expect(summary.results[1].status).toBe(CaseStatus.ACCEPTED);
    expect(summary.testCasesPassed).toBe(1);
  });

  it("keeps judging past a sandbox failure in the middle case", async () => {
    const sandbox = scriptedExecutor([accepted("2"), unavailable(), accepted("6")]);

    const summary = await judgeTestCases({ code: "x", language: Language.PYTHON, testCases: cases(3), limits, executor: sandbox.execute });

    expect(sandbox.calls).toHaveLength(3);
    expect(summary.state).toBe("COMPLETED");
    expect(summary.verdict).toBe(Verdict.RUNTIME_ERROR);
    expect(summary.testCasesPassed).toBe(2);
    expect(summary.results.map((r) => r.status)).toEqual([
      CaseStatus.ACCEPTED,
      CaseStatus.RUNTIME_ERROR,
      CaseStatus.ACCEPTED,
    ]);
  });

  it("is an internal error when the sandbox never answered", async () => {
    const sandbox = scriptedExecutor([unavailable(), unavailable()]);

    const summary = await judgeTestCases({ code: "x", language: Language.PYTHON, testCases: cases(2), limits, executor: sandbox.execute });

    expect(summary.verdict).toBe(Verdict.INTERNAL_ERROR);
    expect(summary.executionTime).toBeNull();
  });

  it("is an internal error when there is nothing to judge", async () => {
    const sandbox = scriptedExecutor([]);

    const summary = await judgeTestCases({ code: "x", language: Language.PYTHON, testCases: [], limits, executor: sandbox.execute });

    expect(summary.verdict).toBe(Verdict.INTERNAL_ERROR);
    expect(summary.state).toBe("COMPLETED");
    expect(summary.totalTestCases).toBe(0);
  });

  it("treats a non-terminal status leaking out of the sandbox as an internal error", async () => {
    const sandbox = scriptedExecutor([outcome(2)]);

    const summary = await judgeTestCases({ code: "x", language: Language.PYTHON, testCases: cases(1), limits, executor: sandbox.execute });

    expect(summary.results[0].status).toBe(CaseStatus.INTERNAL_ERROR);
    expect(summary.verdict).toBe(Verdict.INTERNAL_ERROR);
  });

  it("calls the beforeCase hook once per executed case", async () => {
    const sandbox = scriptedExecutor([compilationError("boom")]);
    const seen: string[] = [];

    await judgeTestCases({
      code: "x",
      language: Language.CPP,
      testCases: cases(3),
      limits,
      executor: sandbox.execute,
      hooks: { beforeCase: async (testCase) => { seen.push(testCase.id); } },
    });

    expect(seen).toEqual(["tc-1"]);
  });
});

describe("decideVerdict", () => {
  it("decides by case order, not by result order", () => {
    const [first, second] = cases(2);
    const base = { actualOutput: "", executionTime: 1, memoryUsed: 1, errorMessage: "", resolved: true };

    const verdict = decideVerdict(
      [
        { ...base, testCase: second, status: CaseStatus.TIME_LIMIT_EXCEEDED },
        { ...base, testCase: first, status: CaseStatus.WRONG_ANSWER },
      ],
      "COMPLETED"
    );

    expect(verdict).toBe(Verdict.WRONG_ANSWER);
  });
});
