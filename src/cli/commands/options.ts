import chalk from 'chalk';
import * as fs from 'fs';
import { ConnectOptions, RemoteCredentials } from '../../interfaces';
import { EnvDefaults } from '../../lib/config';
import { describeError } from '../../lib/errors';
import {
  ValidationError,
  imageReference,
  sanitizeFilePath,
  sanitizeImageReference,
  sanitizeNumber,
  sanitizeSSHHost,
  sanitizeSSHUsername,
} from '../../lib/sanitization';

export interface TemplateCommandOptions {
  template: string;
  image?: string;
  imageRepo?: string;
  imageTag?: string;
  param: string[];
}

export interface RemoteCommandOptions {
  sshKey?: string;
  sshUser?: string;
  remoteHost?: string;
  passphrase?: string;
  maxAttempts?: string;
  backoff?: string;
}

export const collect = (value: string, previous: string[]): string[] => [
  ...previous,
  value,
];

export function resolveImage(
  options: TemplateCommandOptions,
  env: EnvDefaults
): string {
  if (options.image) {
    return sanitizeImageReference(options.image);
  }

  const repo = options.imageRepo || env.imageRepo;
  if (!repo) {
    throw new ValidationError(
      'Image is required. Provide --image, --image-repo/--image-tag or IMAGE_REPO/IMAGE_TAG'
    );
  }
  return imageReference(repo, options.imageTag || env.imageTag);
}

export function readTemplate(templatePath: string): string {
  const resolved = sanitizeFilePath(templatePath, 'Template path');
  try {
    return fs.readFileSync(resolved, 'utf8');
  } catch (error) {
    throw new ValidationError(
      `Cannot read template ${resolved}: ${describeError(error)}`
    );
  }
}

/**
 * Returns undefined when no remote host is configured, i.e. run locally
 */
export function resolveRemote(
  options: RemoteCommandOptions,
  env: EnvDefaults
): RemoteCredentials | undefined {
  const host = options.remoteHost || env.remoteHost;
  if (!host) {
    return undefined;
  }

  const keyPath = options.sshKey || env.sshKey;
  if (!keyPath) {
    throw new ValidationError(
      'SSH key is required for remote runs. Provide --ssh-key or SSH_KEY_PATH'
    );
  }

  return {
    host: sanitizeSSHHost(host),
    username: sanitizeSSHUsername(options.sshUser || env.sshUser || ''),
    keyPath: sanitizeFilePath(keyPath, 'SSH key path'),
    passphrase: options.passphrase || env.passphrase,
  };
}

export function resolveConnectOptions(
  options: RemoteCommandOptions,
  env: EnvDefaults
): ConnectOptions {
  const attempts = options.maxAttempts || env.maxAttempts;
  const backoff = options.backoff || env.backoffMs;

  return {
    maxAttempts:
      attempts === undefined
        ? undefined
        : sanitizeNumber(attempts, 'max attempts', 1, 100),
    backoffMs:
      backoff === undefined
        ? undefined
        : sanitizeNumber(backoff, 'backoff', 0, 60000),
    onAttemptFailed: (attempt, error) => {
      console.log(
        chalk.yellow(
          `⚠️  Connection attempt ${attempt} failed: ${describeError(error)}`
        )
      );
    },
  };
}

export function reportError(action: string, error: unknown): void {
  if (error instanceof ValidationError) {
    console.error(chalk.red(`✗ Validation Error: ${error.message}`));
  } else {
    console.error(chalk.red(`✗ ${action} failed: ${describeError(error)}`));
  }
}
