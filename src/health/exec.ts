import { execFile } from "node:child_process";

export type CommandOptions = {
  cwd?: string;
  timeoutMs?: number;
};

export type CommandRunner = (cmd: string, args: string[], opts?: CommandOptions) => Promise<string>;

/**
 * Executes a command using child_process.execFile and returns trimmed stdout.
 * Rejects with stderr in the message when the command fails.
 */
export const runCommand: CommandRunner = (cmd, args, opts = {}) =>
  new Promise((resolve, reject) => {
    execFile(
      cmd,
      args,
      { cwd: opts.cwd, timeout: opts.timeoutMs ?? 120_000, maxBuffer: 16 * 1024 * 1024 },
      (error, stdout, stderr) => {
        if (error) {
          reject(new Error(`Command failed: ${cmd} ${args.join(" ")}\n${stderr || error.message}`));
          return;
        }
        resolve(stdout.trim());
      }
    );
  });
