import { execFile } from "node:child_process";

export interface ProcessOutcome {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly timedOut: boolean;
  /** Set when the process could not be started or died on a signal. */
  readonly error: string | null;
}

/** Launches one argument vector. Implementations must never go through a shell. */
export interface ProcessRunner {
  run(argv: readonly string[], timeoutMs: number): Promise<ProcessOutcome>;
}

// Volatility output for large dumps (filescan, handles) runs to hundreds of MB.
const MAX_BUFFER = 512 * 1024 * 1024;

export class ChildProcessRunner implements ProcessRunner {
  private readonly maxBuffer: number;

  constructor(maxBuffer: number = MAX_BUFFER) {
    this.maxBuffer = maxBuffer;
  }

  run(argv: readonly string[], timeoutMs: number): Promise<ProcessOutcome> {
    const [file, ...args] = argv;
    if (file === undefined) {
      return Promise.resolve({ stdout: "", stderr: "", exitCode: -1, timedOut: false, error: "Empty argument vector" });
    }

    return new Promise<ProcessOutcome>((resolve) => {
      execFile(
        file,
        args,
        {
          shell: false,
          timeout: timeoutMs,
          killSignal: "SIGKILL",
          maxBuffer: this.maxBuffer,
          encoding: "utf8",
          windowsHide: true,
        },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ stdout, stderr, exitCode: 0, timedOut: false, error: null });
            return;
          }
          // Overflowing maxBuffer also kills with killSignal, so check it first
          if (error.code === "ERR_CHILD_PROCESS_STDIO_MAXBUFFER") {
            resolve({ stdout: "", stderr, exitCode: -1, timedOut: false, error: `Output exceeded ${this.maxBuffer} bytes` });
            return;
          }
          // execFile reports its own timeout by killing with killSignal
          if (error.killed && error.signal === "SIGKILL") {
            resolve({ stdout: "", stderr, exitCode: -1, timedOut: true, error: `Timed out after ${timeoutMs}ms` });
            return;
          }
          if (typeof error.code === "number") {
            resolve({ stdout, stderr, exitCode: error.code, timedOut: false, error: null });
            return;
          }
          const reason = error.signal ? `Terminated by ${error.signal}` : error.message;
          resolve({ stdout, stderr, exitCode: -1, timedOut: false, error: reason });
        }
      );
    });
  }
}
