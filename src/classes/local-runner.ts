import { spawn } from 'child_process';
import { ScriptRunner } from '../interfaces';
import { ExecutionError, describeError, exitReason } from '../lib/errors';

export const DEFAULT_SHELL = 'bash';

export class LocalRunner implements ScriptRunner {
  private shell: string;

  constructor(shell: string = DEFAULT_SHELL) {
    this.shell = shell;
  }

  /**
   * Run the script as `<shell> -c <script>` on this machine
   */
  run(script: string): Promise<string> {
    return new Promise((resolve, reject) => {
      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];
      const stdout = () => Buffer.concat(stdoutChunks).toString('utf8');
      const stderr = () => Buffer.concat(stderrChunks).toString('utf8');

      const child = spawn(this.shell, ['-c', script], {
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      // both pipes are drained for the whole run so a chatty script never blocks
      child.stdout.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

      child.on('error', (error) => {
        reject(
          new ExecutionError({
            reason: describeError(error),
            stdout: stdout(),
            stderr: stderr(),
            exitCode: null,
            cause: error,
          })
        );
      });

      child.on('close', (code, signal) => {
        if (code === 0) {
          resolve(stdout());
          return;
        }
        reject(
          new ExecutionError({
            reason: exitReason(code, signal),
            stdout: stdout(),
            stderr: stderr(),
            exitCode: code,
            signal,
          })
        );
      });
    });
  }
}
