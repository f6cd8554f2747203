import { promises as fs } from 'fs';
import { NodeSSH } from 'node-ssh';
import { utils } from 'ssh2';
import {
  ConnectOptions,
  RemoteCredentials,
  SSHConnectConfig,
  SSHConnection,
} from '../interfaces';
import { ConnectionExhaustedError, CredentialError } from './errors';

export const SSH_PORT = 22;
export const DEFAULT_CONNECT_ATTEMPTS = 20;
export const DEFAULT_CONNECT_BACKOFF_MS = 1000;

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * @description Reads and parses a private key. Neither failure is transient, so there is no retry.
 * @returns The key text, ready to hand to node-ssh.
 */
export async function loadPrivateKey(
  keyPath: string,
  passphrase?: string
): Promise<string> {
  if (!keyPath) {
    throw new CredentialError(keyPath, 'failed to read key file: no path given');
  }

  let key: string;
  try {
    key = await fs.readFile(keyPath, 'utf8');
  } catch (error) {
    throw new CredentialError(keyPath, `failed to read key file ${keyPath}`, error);
  }

  const parsed = utils.parseKey(key, passphrase);
  if (parsed instanceof Error) {
    throw new CredentialError(keyPath, `failed to parse private key ${keyPath}`, parsed);
  }

  return key;
}

/**
 * @description Builds the node-ssh config for a host.
 * Host keys are NOT verified: this is meant for short-lived test machines
 * and must never be pointed at production hosts.
 */
export function buildConnectConfig(
  credentials: RemoteCredentials,
  privateKey: string,
  readyTimeout?: number
): SSHConnectConfig {
  return {
    host: credentials.host,
    port: SSH_PORT,
    username: credentials.username,
    privateKey,
    passphrase: credentials.passphrase,
    readyTimeout,
    hostVerifier: () => true,
  };
}

/**
 * @description Opens an SSH connection, retrying while a freshly booted host is not accepting yet.
 */
export async function connectWithRetry(
  credentials: RemoteCredentials,
  options: ConnectOptions = {}
): Promise<SSHConnection> {
  const maxAttempts = options.maxAttempts ?? DEFAULT_CONNECT_ATTEMPTS;
  const backoffMs = options.backoffMs ?? DEFAULT_CONNECT_BACKOFF_MS;
  const createConnection = options.createConnection ?? (() => new NodeSSH());
  const wait = options.sleep ?? sleep;

  const privateKey = await loadPrivateKey(
    credentials.keyPath,
    credentials.passphrase
  );
  const config = buildConnectConfig(
    credentials,
    privateKey,
    options.readyTimeout
  );

  let lastError: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const connection = createConnection();
    try {
      await connection.connect(config);
      return connection;
    } catch (error) {
      lastError = error;
      connection.dispose();
      options.onAttemptFailed?.(attempt, error);
    }

    if (attempt < maxAttempts) {
      await wait(backoffMs);
    }
  }

  throw new ConnectionExhaustedError(credentials.host, maxAttempts, lastError);
}
