/**
 * Running iproute2/tc/ovs commands
 */

import { spawn } from "node:child_process";
import { createInterface } from "node:readline";
import { Result } from "better-result";
import { DriverError } from "@hostnet/errors";

/** Runs a command to completion and yields its stdout */
export type CommandRunner = (cmd: string, args: string[]) => Promise<Result<string, DriverError>>;

/** Starts a long-running command, calling `onLine` per stdout line; returns its stop function */
export type LineWatcher = (
  cmd: string,
  args: string[],
  onLine: (line: string) => void
) => Result<() => void, DriverError>;

function describeCommand(cmd: string, args: string[]): string {
  return [cmd, ...args].join(" ");
}

/**
 * Run a command and return its stdout. A non-zero exit is a DriverError
 * carrying stderr.
 */
export const runCommand: CommandRunner = (cmd, args) =>
  new Promise((resolve) => {
    const proc = spawn(cmd, args, { stdio: ["ignore", "pipe", "pipe"] });
    let stdout = "";
    let stderr = "";

    proc.stdout.setEncoding("utf8");
    proc.stderr.setEncoding("utf8");
    proc.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });
    proc.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });

    proc.on("error", (error) => {
      resolve(
        Result.err(
          new DriverError({
            message: `Command failed: ${describeCommand(cmd, args)}: ${error.message}`,
            operation: cmd,
            cause: error,
          })
        )
      );
    });

    proc.on("close", (exitCode) => {
      if (exitCode !== 0) {
        resolve(
          Result.err(
            new DriverError({
              message: `Command failed: ${describeCommand(cmd, args)}: ${stderr.trim()}`,
              operation: cmd,
              cause: exitCode,
            })
          )
        );
        return;
      }
      resolve(Result.ok(stdout));
    });
  });

export const watchLines: LineWatcher = (cmd, args, onLine) => {
  let proc: ReturnType<typeof spawn>;
  try {
    proc = spawn(cmd, args, { stdio: ["ignore", "pipe", "ignore"] });
  } catch (error) {
    return Result.err(
      new DriverError({
        message: `Failed to start ${describeCommand(cmd, args)}`,
        operation: cmd,
        cause: error,
      })
    );
  }

  const stdout = proc.stdout;
  if (!stdout) {
    proc.kill();
    return Result.err(
      new DriverError({ message: `No output from ${describeCommand(cmd, args)}`, operation: cmd })
    );
  }

  const lines = createInterface({ input: stdout });
  lines.on("line", onLine);
  // a monitor that fails to start simply never reports; the waiter times out
  proc.on("error", () => lines.close());

  return Result.ok(() => {
    lines.close();
    proc.kill();
  });
};
