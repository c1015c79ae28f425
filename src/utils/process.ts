import { execFile } from "node:child_process";
import { CommandError } from "../errors.js";

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

const MAX_BUFFER = 16 * 1024 * 1024;

export function runCommand(
  command: string,
  args: string[],
  options?: { cwd?: string; timeoutMs?: number; env?: Record<string, string> }
): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    execFile(
      command,
      args,
      {
        cwd: options?.cwd,
        env: { ...process.env, ...options?.env },
        timeout: options?.timeoutMs,
        maxBuffer: MAX_BUFFER,
        encoding: "utf8",
        windowsHide: true,
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ stdout, stderr, exitCode: 0 });
          return;
        }
        // String codes (ENOENT, EACCES) come from spawn itself
        const spawnFailed = typeof error.code === "string";
        const exitCode = typeof error.code === "number" ? error.code : 1;
        reject(
          new CommandError(
            `Command failed (${command} ${args.join(" ")}): code=${error.code ?? exitCode}\nSTDERR: ${stderr || error.message}`,
            exitCode,
            stderr || "",
            stdout || "",
            spawnFailed
          )
        );
      }
    );
  });
}
