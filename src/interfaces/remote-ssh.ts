import { NodeSSH } from 'node-ssh';

/**
 * @description The connection config node-ssh accepts (ssh2's ConnectConfig plus key helpers).
 */
export type SSHConnectConfig = Parameters<NodeSSH['connect']>[0];

export interface RemoteCredentials {
  /**
   * @description Path to a PEM or OpenSSH encoded private key.
   */
  keyPath: string;
  /**
   * @description The login user.
   */
  username: string;
  /**
   * @description Hostname or IP address; the SSH port is always 22.
   */
  host: string;
  /**
   * @description Passphrase for an encrypted private key.
   */
  passphrase?: string;
}

export interface SSHCommandResult {
  stdout: string;
  stderr: string;
  code: number | null;
  signal?: string | null;
}

/**
 * @description The slice of NodeSSH used to run one script.
 */
export interface SSHExecOptions {
  /**
   * @description node-ssh trims both streams unless this is set.
   */
  noTrim?: boolean;
}

export interface SSHConnection {
  connect(config: SSHConnectConfig): Promise<unknown>;
  execCommand(
    command: string,
    options?: SSHExecOptions
  ): Promise<SSHCommandResult>;
  dispose(): void;
}

export interface ConnectOptions {
  /**
   * @description Total number of connection attempts, default 20.
   */
  maxAttempts?: number;
  /**
   * @description Wait between failed attempts in milliseconds, default 1000.
   */
  backoffMs?: number;
  /**
   * @description Handshake timeout of a single attempt in milliseconds.
   */
  readyTimeout?: number;
  /**
   * @description Creates a fresh, unconnected connection for each attempt.
   */
  createConnection?: () => SSHConnection;
  sleep?: (ms: number) => Promise<void>;
  /**
   * @description Called after every failed attempt, before waiting.
   */
  onAttemptFailed?: (attempt: number, error: unknown) => void;
}
