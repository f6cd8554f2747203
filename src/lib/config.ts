/**
 * @description Settings the CLI falls back to when an option is not given.
 * Values stay raw strings; the commands validate them.
 */
export interface EnvDefaults {
  imageRepo?: string;
  imageTag?: string;
  sshKey?: string;
  sshUser?: string;
  remoteHost?: string;
  passphrase?: string;
  maxAttempts?: string;
  backoffMs?: string;
}

function read(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

export function readEnvDefaults(
  env: NodeJS.ProcessEnv = process.env
): EnvDefaults {
  return {
    imageRepo: read(env, 'IMAGE_REPO'),
    imageTag: read(env, 'IMAGE_TAG'),
    sshKey: read(env, 'SSH_KEY_PATH'),
    sshUser: read(env, 'SSH_USER'),
    remoteHost: read(env, 'REMOTE_HOST'),
    passphrase: read(env, 'SSH_KEY_PASSPHRASE'),
    maxAttempts: read(env, 'SSH_CONNECT_ATTEMPTS'),
    backoffMs: read(env, 'SSH_CONNECT_BACKOFF_MS'),
  };
}
