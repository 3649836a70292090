import { spawn } from "child_process";
import { PipelineError } from "../errors";
import { appendText } from "../utils/fs";
import type { Logger } from "../utils/log";
import { errorMessage } from "../utils/text";

export interface CommandSpec {
  file: string;
  args: string[];
}

export interface RunCommandOptions {
  logger: Logger;
  cwd?: string;
  /** Appends `stdout\n\nstderr\n` to this file after the process exits. */
  logPath?: string;
  timeoutMs?: number;
  /** Time between SIGTERM and SIGKILL once a timeout or abort fires. Defaults to 5 seconds. */
  killGraceMs?: number;
  signal?: AbortSignal;
}

export const DEFAULT_KILL_GRACE_MS = 5000;

export interface CommandResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  durationMs: number;
}

export type CommandRunner = (command: CommandSpec, options: RunCommandOptions) => Promise<CommandResult>;

export function formatCommand(command: CommandSpec): string {
  return [command.file, ...command.args]
    .map((part) => (/[\s'"]/.test(part) ? JSON.stringify(part) : part))
    .join(" ");
}

export function commandSucceeded(result: CommandResult): boolean {
  return result.exitCode === 0 && !result.timedOut;
}

type ProcessOutput = Omit<CommandResult, "durationMs">;

function spawnAndCollect(command: CommandSpec, options: RunCommandOptions): Promise<ProcessOutput> {
  return new Promise((resolve, reject) => {
    const child = spawn(command.file, command.args, {
      cwd: options.cwd,
      stdio: ["ignore", "pipe", "pipe"]
    });
    const killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;

    let stdout = "";
    let stderr = "";
    let timedOut = false;
    let aborted = false;
    let settled = false;

    let killTimer: NodeJS.Timeout | null = null;

    // SIGTERM first; SIGKILL if the process is still alive after the grace period.
    const terminate = () => {
      child.kill("SIGTERM");
      if (killTimer) return;
      killTimer = setTimeout(() => {
        if (child.exitCode === null && child.signalCode === null) child.kill("SIGKILL");
      }, killGraceMs);
    };

    const onAbort = () => {
      aborted = true;
      terminate();
    };
    options.signal?.addEventListener("abort", onAbort, { once: true });

    const timer =
      options.timeoutMs !== undefined
        ? setTimeout(() => {
            timedOut = true;
            terminate();
          }, options.timeoutMs)
        : null;

    const finish = () => {
      settled = true;
      if (timer) clearTimeout(timer);
      if (killTimer) clearTimeout(killTimer);
      options.signal?.removeEventListener("abort", onAbort);
    };

    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");

    child.stdout.on("data", (data: string) => {
      stdout += data;
    });

    child.stderr.on("data", (data: string) => {
      stderr += data;
    });

    child.on("error", (error) => {
      if (settled) return;
      finish();
      reject(error);
    });

    child.on("close", (code, signal) => {
      if (settled) return;
      finish();
      if (aborted) {
        reject(
          new PipelineError("Cancelled", `Command cancelled: ${formatCommand(command)}`, {
            command: formatCommand(command)
          })
        );
        return;
      }
      resolve({ exitCode: code, signal, stdout, stderr, timedOut });
    });
  });
}

/**
 * Runs a command to completion and captures its output. A nonzero exit is reported as a
 * warning and returned to the caller; only a process that cannot be started throws.
 */
export const runCommand: CommandRunner = async (command, options) => {
  const { logger } = options;
  const rendered = formatCommand(command);
  if (options.signal?.aborted) {
    throw new PipelineError("Cancelled", `Command cancelled: ${rendered}`, { command: rendered });
  }

  const startTime = Date.now();
  let output: ProcessOutput;
  try {
    output = await spawnAndCollect(command, options);
  } catch (error) {
    if (error instanceof PipelineError) throw error;
    logger.error("Error executing command", { command: rendered, error: errorMessage(error) });
    throw new PipelineError(
      "LaunchFailure",
      `Could not launch ${command.file}: ${errorMessage(error)}`,
      { command: rendered, cause: error }
    );
  }

  const result: CommandResult = { ...output, durationMs: Date.now() - startTime };

  if (options.logPath) {
    await appendText(options.logPath, `${result.stdout}\n\n${result.stderr}\n`);
  }

  if (!commandSucceeded(result)) {
    logger.warn(result.timedOut ? "Command timed out" : "Command failed", {
      command: rendered,
      exit_code: result.exitCode,
      signal: result.signal,
      stderr: result.stderr.trim()
    });
  }

  return result;
};
