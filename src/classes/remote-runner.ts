import {
  ConnectOptions,
  RemoteCredentials,
  SSHCommandResult,
  ScriptRunner,
} from '../interfaces';
import { connectWithRetry } from '../lib/connect';
import { ExecutionError, SessionError, exitReason } from '../lib/errors';

export class RemoteRunner implements ScriptRunner {
  private readonly credentials: Readonly<RemoteCredentials>;
  private readonly connectOptions: ConnectOptions;

  constructor(credentials: RemoteCredentials, connectOptions: ConnectOptions = {}) {
    this.credentials = { ...credentials };
    this.connectOptions = connectOptions;
  }

  get host(): string {
    return this.credentials.host;
  }

  /**
   * Connect (with retry), run the script in a single session and disconnect
   */
  async run(script: string): Promise<string> {
    const connection = await connectWithRetry(
      this.credentials,
      this.connectOptions
    );

    try {
      let result: SSHCommandResult;
      try {
        result = await connection.execCommand(script, { noTrim: true });
      } catch (error) {
        throw new SessionError(this.credentials.host, error);
      }

      if (result.code !== 0) {
        throw new ExecutionError({
          reason: exitReason(result.code, result.signal),
          stdout: result.stdout,
          stderr: result.stderr,
          exitCode: result.code,
          signal: result.signal,
        });
      }

      return result.stdout;
    } finally {
      connection.dispose();
    }
  }
}
