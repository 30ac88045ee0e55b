// cryo subprocess execution bridge
import { spawn } from "child_process";

export interface ProcessResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface RunOptions {
  // Unset means no limit; only the sample extraction passes one
  timeoutMs?: number;
}

export interface ProcessRunner {
  readonly binary: string;
  run(args: string[], options?: RunOptions): Promise<ProcessResult>;
}

// Shell-friendly rendering of a command line, for error payloads and logs
export function formatCommand(binary: string, args: string[]): string {
  return [binary, ...args].join(" ");
}

export class CryoRunner implements ProcessRunner {
  constructor(readonly binary: string = "cryo") {}

  run(args: string[], options: RunOptions = {}): Promise<ProcessResult> {
    const { timeoutMs } = options;
    return new Promise((resolve, reject) => {
      const proc = spawn(this.binary, args, {
        env: process.env,
        stdio: ["ignore", "pipe", "pipe"],
      });

      let stdout = "";
      let stderr = "";
      let timedOut = false;

      const timer =
        timeoutMs === undefined
          ? undefined
          : setTimeout(() => {
              timedOut = true;
              proc.kill("SIGKILL"); // SIGTERM may be ignored mid-RPC
            }, timeoutMs);

      proc.stdout.on("data", (chunk: Buffer) => {
        stdout += chunk.toString();
      });
      proc.stderr.on("data", (chunk: Buffer) => {
        stderr += chunk.toString();
      });

      proc.on("close", (code) => {
        clearTimeout(timer);
        if (timedOut) {
          reject(new Error(`${formatCommand(this.binary, args)} timed out after ${timeoutMs}ms`));
          return;
        }
        resolve({ stdout, stderr, exitCode: code ?? 1 });
      });

      proc.on("error", (e) => {
        clearTimeout(timer);
        reject(e);
      });
    });
  }
}
