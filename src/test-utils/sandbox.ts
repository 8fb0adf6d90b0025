import { ExecutionUnit, Judge0Outcome, SandboxExecutor, SandboxResult } from "../services/judge0.service";

export const outcome = (statusId: number, fields: Omit<Judge0Outcome, "status"> = {}): SandboxResult => ({
  ok: true,
  outcome: { time: "0.010", memory: 1024, stdout: "", ...fields, status: { id: statusId, description: "" } },
});

export const accepted = (stdout: string, time = "0.010", memory = 1024) => outcome(3, { stdout, time, memory });
export const wrongAnswer = (stdout: string, time = "0.010", memory = 1024) => outcome(4, { stdout, time, memory });
export const compilationError = (compileOutput: string) =>
  outcome(6, { compile_output: compileOutput, time: null, memory: null });
export const unavailable = (): SandboxResult => ({ ok: false, reason: "execution timeout/unavailable" });

/**
 * Executor that answers from a script, in call order, and records what it was sent.
 */
export const scriptedExecutor = (script: SandboxResult[]) => {
  const calls: ExecutionUnit[] = [];
  const execute: SandboxExecutor = async (unit) => {
    calls.push(unit);
    const next = script[calls.length - 1];
    if (!next) throw new Error(`No scripted result for call ${calls.length}`);
    return next;
  };
  return { execute, calls };
};
