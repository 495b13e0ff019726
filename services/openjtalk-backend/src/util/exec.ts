import { spawn } from "node:child_process";
import { log } from "./log";

export interface ExecResult {
  /** -1 when the process was terminated by a signal. */
  code: number;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

export interface ExecOptions {
  cwd?: string;
  /** 0 or undefined waits for the process however long it takes. */
  timeoutMs?: number;
  inputText?: string;
  env?: NodeJS.ProcessEnv;
}

export type ExecFn = (file: string, args: string[], opts?: ExecOptions) => Promise<ExecResult>;

/**
 * Spawns `file` with an argument vector (no shell), feeds `inputText` on stdin
 * and resolves once the process has exited. Rejects only when the process
 * could not be started.
 */
export const execFile: ExecFn = async (file, args, opts) => {
  const timeoutMs = opts?.timeoutMs ?? 0;
  return await new Promise<ExecResult>((resolve, reject) => {
    const child = spawn(file, args, {
      cwd: opts?.cwd,
      env: { ...process.env, ...(opts?.env ?? {}) },
      stdio: ["pipe", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";

    const timer =
      timeoutMs > 0
        ? setTimeout(() => {
            log.warn("exec timeout, killing process", { file, timeoutMs });
            child.kill("SIGKILL");
          }, timeoutMs)
        : undefined;

    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (d: string) => (stdout += d));
    child.stderr.on("data", (d: string) => (stderr += d));

    // EPIPE when the child exits (or never starts) before reading its input
    child.stdin.on("error", (err) => {
      log.debug("exec stdin closed early", { file, err: err.message });
    });

    child.on("error", (err) => {
      clearTimeout(timer);
      reject(err);
    });

    child.on("close", (code, signal) => {
      clearTimeout(timer);
      resolve({ code: code ?? -1, signal, stdout, stderr });
    });

    if (opts?.inputText) {
      child.stdin.write(opts.inputText);
    }
    child.stdin.end();
  });
};
