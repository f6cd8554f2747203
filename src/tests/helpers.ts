import { generateKeyPairSync } from 'crypto';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  SSHCommandResult,
  SSHConnectConfig,
  SSHConnection,
  SSHExecOptions,
} from '../interfaces';

export interface FakeBehaviour {
  connectError?: Error;
  execError?: Error;
  result?: SSHCommandResult;
}

/**
 * In-process stand-in for NodeSSH that records every call
 */
export class FakeConnection implements SSHConnection {
  public connectCalls: SSHConnectConfig[] = [];
  public commands: string[] = [];
  public execOptions: (SSHExecOptions | undefined)[] = [];
  public disposeCount = 0;

  constructor(private behaviour: FakeBehaviour = {}) {}

  async connect(config: SSHConnectConfig): Promise<this> {
    this.connectCalls.push(config);
    if (this.behaviour.connectError) {
      throw this.behaviour.connectError;
    }
    return this;
  }

  async execCommand(
    command: string,
    options?: SSHExecOptions
  ): Promise<SSHCommandResult> {
    this.commands.push(command);
    this.execOptions.push(options);
    if (this.behaviour.execError) {
      throw this.behaviour.execError;
    }
    return (
      this.behaviour.result ?? { stdout: '', stderr: '', code: 0, signal: null }
    );
  }

  dispose(): void {
    this.disposeCount++;
  }
}

export function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'rsr-test-'));
}

/**
 * Generates a PEM (PKCS#1) RSA private key
 */
export function generateTestKey(): string {
  const { privateKey } = generateKeyPairSync('rsa', {
    modulusLength: 2048,
    publicKeyEncoding: { type: 'pkcs1', format: 'pem' },
    privateKeyEncoding: { type: 'pkcs1', format: 'pem' },
  });
  return privateKey;
}

export function writeTestKey(dir: string, name = 'id_rsa'): string {
  const keyPath = path.join(dir, name);
  fs.writeFileSync(keyPath, generateTestKey(), { mode: 0o600 });
  return keyPath;
}

export async function expectRejection<T extends Error>(
  promise: Promise<unknown>,
  errorClass: new (...args: never[]) => T
): Promise<T> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof errorClass) {
      return error;
    }
    throw new Error(
      `Expected ${errorClass.name} but got ${error instanceof Error ? error.name : String(error)}`
    );
  }
  throw new Error(`Expected promise to reject with ${errorClass.name}`);
}

export function expectThrow<T extends Error>(
  fn: () => unknown,
  errorClass: new (...args: never[]) => T
): T {
  try {
    fn();
  } catch (error) {
    if (error instanceof errorClass) {
      return error;
    }
    throw new Error(
      `Expected ${errorClass.name} but got ${error instanceof Error ? error.name : String(error)}`
    );
  }
  throw new Error(`Expected function to throw ${errorClass.name}`);
}
