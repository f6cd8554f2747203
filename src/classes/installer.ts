import {
  ConnectOptions,
  ExecutionTarget,
  InstallerOptions,
  ScriptRunner,
  TemplateParams,
} from '../interfaces';
import { renderTemplate } from '../lib/template';
import { LocalRunner } from './local-runner';
import { RemoteRunner } from './remote-runner';

export interface RunnerOptions {
  shell?: string;
  connectOptions?: ConnectOptions;
}

/**
 * @description Picks the execution strategy for a target.
 */
export function createRunner(
  target: ExecutionTarget,
  options: RunnerOptions = {}
): ScriptRunner {
  switch (target.kind) {
    case 'local':
      return new LocalRunner(options.shell);
    case 'remote':
      return new RemoteRunner(
        {
          keyPath: target.keyPath,
          username: target.username,
          host: target.host,
          passphrase: target.passphrase,
        },
        options.connectOptions
      );
    default: {
      const unknownTarget: never = target;
      throw new Error(`Unknown execution target: ${JSON.stringify(unknownTarget)}`);
    }
  }
}

export class Installer {
  public readonly image: string;
  public readonly template: string;
  public readonly params: TemplateParams;

  public readonly sshKey?: string;
  public readonly sshUser?: string;
  public readonly remoteHost?: string;
  public readonly passphrase?: string;

  private readonly shell?: string;
  private readonly connectOptions?: ConnectOptions;

  constructor(options: InstallerOptions) {
    this.image = options.image;
    this.template = options.template;
    this.params = options.params ?? {};
    this.sshKey = options.sshKey;
    this.sshUser = options.sshUser;
    this.remoteHost = options.remoteHost;
    this.passphrase = options.passphrase;
    this.shell = options.shell;
    this.connectOptions = options.connectOptions;
  }

  /**
   * @description Renders the template; .Image always refers to this installer's image.
   */
  render(): string {
    return renderTemplate(this.template, { ...this.params, Image: this.image });
  }

  /**
   * @description Remote when a host is configured, local otherwise.
   */
  target(): ExecutionTarget {
    if (!this.remoteHost) {
      return { kind: 'local' };
    }
    return {
      kind: 'remote',
      keyPath: this.sshKey ?? '',
      username: this.sshUser ?? '',
      host: this.remoteHost,
      passphrase: this.passphrase,
    };
  }

  /**
   * @description Renders and runs the script. Output is discarded; failures propagate unchanged.
   */
  async install(): Promise<void> {
    const script = this.render();
    const runner = createRunner(this.target(), {
      shell: this.shell,
      connectOptions: this.connectOptions,
    });
    await runner.run(script);
  }
}
