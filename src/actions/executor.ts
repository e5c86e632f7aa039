import { execFile } from "node:child_process";
import { constants } from "node:os";
import { failures, type ExecutionError } from "./errors.js";
import { wrapScript } from "./script.js";
import { ok, err, type RawExecutionResult, type Result } from "./types.js";
import { once } from "../utils/once.js";
import type { Logger } from "../logging/logger.js";

export type ExecOutcome = Result<RawExecutionResult, ExecutionError>;

/** The only boundary to the external tool: one script in, one process out. */
export interface ScriptExecutor {
  run(script: string): Promise<ExecOutcome>;
  warmUp?(): Promise<boolean>;
}

export interface PowerShellExecutorOpts {
  readonly binary?: string;
  readonly timeout: number;
  /** Cap on captured stdout and stderr, each. */
  readonly maxBuffer?: number;
  readonly logger: Logger;
  readonly platform?: NodeJS.Platform;
  /** Replaces the PowerShell command line; the binary then receives these args as-is. */
  readonly buildArgs?: (script: string) => string[];
}

export const DEFAULT_MAX_BUFFER = 10 * 1024 * 1024;
const MAX_BUFFER_EXCEEDED = "ERR_CHILD_PROCESS_STDIO_MAXBUFFER";
const WARM_UP_SCRIPT = "Write-Output 'ready'";

export function defaultBinary(platform: NodeJS.Platform = process.platform): string {
  return platform === "win32" ? "powershell.exe" : "pwsh";
}

export function powerShellArgs(script: string, platform: NodeJS.Platform = process.platform): string[] {
  const args = ["-NoLogo", "-NoProfile", "-NonInteractive", "-ExecutionPolicy", "Bypass"];
  if (platform === "win32") {
    args.push("-WindowStyle", "Hidden");
  }
  args.push("-Command", wrapScript(script));
  return args;
}

export class PowerShellExecutor implements ScriptExecutor {
  readonly binary: string;
  private readonly timeout: number;
  readonly maxBuffer: number;
  private readonly logger: Logger;
  private readonly platform: NodeJS.Platform;
  private readonly buildArgs: (script: string) => string[];
  private readonly warmUpOnce: () => Promise<boolean>;

  constructor(opts: PowerShellExecutorOpts) {
    this.platform = opts.platform ?? process.platform;
    this.binary = opts.binary ?? defaultBinary(this.platform);
    this.timeout = opts.timeout;
    this.maxBuffer = opts.maxBuffer ?? DEFAULT_MAX_BUFFER;
    this.logger = opts.logger.child({ component: "executor" });
    this.buildArgs = opts.buildArgs ?? ((script) => powerShellArgs(script, this.platform));
    this.warmUpOnce = once(() => this.runWarmUp());
  }

  async run(script: string): Promise<ExecOutcome> {
    const args = this.buildArgs(script);
    const started = Date.now();
    this.logger.debug({ binary: this.binary, script }, "Running script");

    return new Promise<ExecOutcome>((resolve) => {
      execFile(
        this.binary,
        args,
        {
          timeout: this.timeout,
          maxBuffer: this.maxBuffer,
          windowsHide: true,
          encoding: "utf8",
        },
        (error, stdout, stderr) => {
          const durationMs = Date.now() - started;

          if (!error) {
            this.logger.debug({ durationMs }, "Script finished");
            resolve(ok({ stdout, stderr, exitSucceeded: true, exitCode: 0 }));
            return;
          }

          const code: unknown = error.code;

          // Node kills the child itself once output passes maxBuffer.
          if (code === MAX_BUFFER_EXCEEDED) {
            this.logger.warn({ durationMs, maxBuffer: this.maxBuffer }, "Script output exceeded buffer");
            resolve(err(failures.overflow(this.maxBuffer, stdout)));
            return;
          }

          if (error.killed) {
            this.logger.warn({ durationMs, timeout: this.timeout }, "Script timed out");
            resolve(err(failures.timeout(this.timeout)));
            return;
          }

          if (typeof code === "number") {
            this.logger.debug({ durationMs, exitCode: code }, "Script exited with failure");
            resolve(ok({ stdout, stderr, exitSucceeded: false, exitCode: code }));
            return;
          }

          if (error.signal) {
            this.logger.warn({ durationMs, signal: error.signal }, "Script terminated by signal");
            resolve(
              ok({
                stdout,
                stderr,
                exitSucceeded: false,
                exitCode: 128 + constants.signals[error.signal],
                signal: error.signal,
              }),
            );
            return;
          }

          this.logger.warn({ binary: this.binary, err: error }, "Failed to spawn script");
          resolve(err(failures.spawn(error.message)));
        },
      );
    });
  }

  /**
   * Starts the tool once so later calls hit a warm disk cache. Safe to call
   * from any number of callers; resolves false instead of rejecting.
   */
  warmUp(): Promise<boolean> {
    return this.warmUpOnce();
  }

  private async runWarmUp(): Promise<boolean> {
    const outcome = await this.run(WARM_UP_SCRIPT);
    if (outcome.ok && outcome.value.exitSucceeded) {
      this.logger.info("PowerShell session warmed up");
      return true;
    }
    const reason = outcome.ok ? outcome.value.stderr.trim() : outcome.error.message;
    this.logger.warn({ reason }, "PowerShell warm-up failed");
    return false;
  }
}
