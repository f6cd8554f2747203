import { ConnectOptions } from './remote-ssh';
import { TemplateParams } from './script';

export interface InstallerOptions {
  /**
   * @description The script template, e.g. `docker pull {{.Image}}`.
   */
  template: string;
  /**
   * @description The image reference, available to the template as .Image.
   */
  image: string;
  /**
   * @description Extra template fields.
   */
  params?: TemplateParams;
  sshKey?: string;
  sshUser?: string;
  /**
   * @description When empty or unset the script runs on the local machine.
   */
  remoteHost?: string;
  passphrase?: string;
  /**
   * @description Interpreter for local runs, default bash.
   */
  shell?: string;
  connectOptions?: ConnectOptions;
}
