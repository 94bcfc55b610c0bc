import { spawn } from "child_process";

export interface ProcessResult {
  /** -1 when the process could not be started or was killed. */
  exitCode: number;
  stdout: string;
  stderr: string;
  /** Spawn or deadline failure, when the process did not exit on its own. */
  error?: string;
}

/**
 * The only I/O boundary of the pipeline: runs an external executable to
 * completion. Swappable so probing and rendering can be tested without
 * real media tools.
 */
export interface ProcessRunner {
  run(command: string, args: readonly string[]): Promise<ProcessResult>;
}

export interface ProcessRunnerOptions {
  /** Kill the child after this many ms. Unset or 0 means no deadline. */
  timeoutMs?: number;
}

// Diagnostics beyond this are dropped; ffmpeg can be very chatty.
const MAX_CAPTURE_CHARS = 64 * 1024;

function append(buffer: string, chunk: string): string {
  if (buffer.length >= MAX_CAPTURE_CHARS) return buffer;
  return (buffer + chunk).slice(0, MAX_CAPTURE_CHARS);
}

export function createProcessRunner(
  options: ProcessRunnerOptions = {}
): ProcessRunner {
  const timeoutMs = options.timeoutMs ?? 0;

  return {
    run(command, args) {
      return new Promise((resolve) => {
        const proc = spawn(command, [...args], {
          stdio: ["ignore", "pipe", "pipe"],
        });
        let stdout = "";
        let stderr = "";
        let settled = false;
        let timer: NodeJS.Timeout | undefined;

        const finish = (result: ProcessResult) => {
          if (settled) return;
          settled = true;
          if (timer) clearTimeout(timer);
          resolve(result);
        };

        proc.stdout.setEncoding("utf8");
        proc.stdout.on("data", (chunk: string) => {
          stdout = append(stdout, chunk);
        });
        proc.stderr.setEncoding("utf8");
        proc.stderr.on("data", (chunk: string) => {
          stderr = append(stderr, chunk);
        });

        if (timeoutMs > 0) {
          timer = setTimeout(() => {
            proc.kill("SIGKILL");
            finish({
              exitCode: -1,
              stdout,
              stderr,
              error: `${command} did not finish within ${timeoutMs}ms`,
            });
          }, timeoutMs);
        }

        proc.on("error", (err) => {
          finish({ exitCode: -1, stdout, stderr, error: err.message });
        });

        proc.on("close", (code, signal) => {
          if (code === null) {
            finish({
              exitCode: -1,
              stdout,
              stderr,
              error: `${command} terminated by signal ${signal ?? "unknown"}`,
            });
            return;
          }
          finish({ exitCode: code, stdout, stderr });
        });
      });
    },
  };
}

/**
 * Quote a command line for display. Arguments are passed to spawn as a
 * vector, so this is only ever used in diagnostics.
 */
export function formatCommandLine(
  command: string,
  args: readonly string[]
): string {
  return [command, ...args].map(shellQuote).join(" ");
}

function shellQuote(arg: string): string {
  if (arg.length > 0 && /^[A-Za-z0-9_@%+=:,./-]+$/.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}
