// Child process runner for the ffmpeg toolchain

import { spawn } from 'child_process';

export interface CommandResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (command: string, args: string[], signal: AbortSignal) => Promise<CommandResult>;

/**
 * Spawn a command and collect its output. Aborting the signal terminates
 * the process (SIGTERM, then SIGKILL after 5 seconds) and rejects.
 */
export const spawnCommand: CommandRunner = (command, args, signal) => {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason instanceof Error ? signal.reason : new Error('Aborted'));
      return;
    }

    const proc = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

    let stdout = '';
    let stderr = '';

    proc.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    proc.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    const onAbort = () => {
      proc.kill('SIGTERM');
      setTimeout(() => {
        if (proc.exitCode === null && proc.signalCode === null) {
          proc.kill('SIGKILL');
        }
      }, 5000).unref();
      reject(signal.reason instanceof Error ? signal.reason : new Error('Aborted'));
    };
    signal.addEventListener('abort', onAbort, { once: true });

    proc.on('close', (code) => {
      signal.removeEventListener('abort', onAbort);
      resolve({ code, stdout, stderr });
    });

    proc.on('error', (err) => {
      signal.removeEventListener('abort', onAbort);
      reject(new Error(`Failed to spawn ${command}: ${err.message}`));
    });
  });
};
