export * from './interfaces';
export * from './lib/errors';
export { renderTemplate, parseTemplate } from './lib/template';
export type { TemplateNode } from './lib/template';
export {
  connectWithRetry,
  loadPrivateKey,
  buildConnectConfig,
  SSH_PORT,
  DEFAULT_CONNECT_ATTEMPTS,
  DEFAULT_CONNECT_BACKOFF_MS,
} from './lib/connect';
export { LocalRunner, DEFAULT_SHELL } from './classes/local-runner';
export { RemoteRunner } from './classes/remote-runner';
export { Installer, createRunner } from './classes/installer';
export type { RunnerOptions } from './classes/installer';
