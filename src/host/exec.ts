import { execFile } from 'node:child_process';

export interface CommandResult {
  stdout: string;
  stderr: string;
  code: number;
}

export type CommandRunner = (file: string, args: readonly string[]) => Promise<CommandResult>;

/**
 * Run a program to completion. A non-zero exit resolves with its code;
 * failing to start the program at all rejects.
 */
export const execRunner: CommandRunner = (file, args) =>
  new Promise((resolve, reject) => {
    execFile(file, [...args], { encoding: 'utf-8' }, (err, stdout, stderr) => {
      if (!err) {
        resolve({ stdout, stderr, code: 0 });
        return;
      }
      if (typeof err.code === 'number') {
        resolve({ stdout, stderr, code: err.code });
        return;
      }
      reject(new Error(`Failed to run ${file}: ${err.message}`));
    });
  });
