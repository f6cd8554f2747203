import { Command } from 'commander';
import chalk from 'chalk';
import Table from 'cli-table3';
import { Installer } from '../../classes/installer';
import { ExecutionTarget } from '../../interfaces';
import { readEnvDefaults } from '../../lib/config';
import {
  RemoteCommandOptions,
  TemplateCommandOptions,
  collect,
  readTemplate,
  reportError,
  resolveConnectOptions,
  resolveImage,
  resolveRemote,
} from './options';
import { sanitizeParams } from '../../lib/sanitization';

interface InstallCommandOptions
  extends TemplateCommandOptions,
    RemoteCommandOptions {
  shell?: string;
}

function printTarget(target: ExecutionTarget, image: string) {
  const table = new Table({
    head: ['Target', 'Image', 'Host', 'User', 'Key'],
  });

  if (target.kind === 'local') {
    table.push(['local', image, '-', '-', '-']);
  } else {
    table.push([
      'remote',
      image,
      target.host,
      target.username,
      target.keyPath,
    ]);
  }

  console.log(table.toString());
}

function addTemplateOptions(command: Command): Command {
  return command
    .requiredOption('-t, --template <path>', 'Path to the script template')
    .option('-i, --image <ref>', 'Full image reference, e.g. repo/name:tag')
    .option('--image-repo <repo>', 'Repository of the image')
    .option('--image-tag <tag>', 'Tag of the image')
    .option(
      '--param <key=value>',
      'Extra template field (repeatable)',
      collect,
      []
    );
}

export function registerInstallCommands(program: Command) {
  // example: npx tsx src/cli/index.ts install --template ./install.sh.tmpl --image-repo demo --image-tag 1.0 --remote-host 10.0.0.5 --ssh-user ubuntu --ssh-key ~/.ssh/id_rsa
  addTemplateOptions(
    program.command('install').description('Render a script and run it locally or on a remote host')
  )
    .option('--ssh-key <path>', 'Path to SSH private key file')
    .option('--ssh-user <username>', 'SSH username')
    .option('--remote-host <host>', 'Remote host; omit to run locally')
    .option('--passphrase <passphrase>', 'Passphrase for the private key')
    .option('--max-attempts <number>', 'SSH connection attempts (default: 20)')
    .option('--backoff <ms>', 'Wait between connection attempts (default: 1000)')
    .option('--shell <path>', 'Interpreter for local runs (default: bash)')
    .action(async (options: InstallCommandOptions) => {
      try {
        const env = readEnvDefaults();
        const image = resolveImage(options, env);
        const template = readTemplate(options.template);
        const params = sanitizeParams(options.param);
        const remote = resolveRemote(options, env);

        const installer = new Installer({
          template,
          image,
          params,
          sshKey: remote?.keyPath,
          sshUser: remote?.username,
          remoteHost: remote?.host,
          passphrase: remote?.passphrase,
          shell: options.shell,
          connectOptions: resolveConnectOptions(options, env),
        });

        printTarget(installer.target(), image);

        console.log(chalk.dim('Running install script...'));
        await installer.install();

        console.log(chalk.green('✓ Install succeeded'));
      } catch (error) {
        reportError('Install', error);
        process.exit(1);
      }
    });

  // example: npx tsx src/cli/index.ts render --template ./install.sh.tmpl --image demo:1.0 --param CHANNEL=stable
  addTemplateOptions(
    program.command('render').description('Print the rendered script without running it')
  ).action((options: TemplateCommandOptions) => {
    try {
      const env = readEnvDefaults();
      const installer = new Installer({
        template: readTemplate(options.template),
        image: resolveImage(options, env),
        params: sanitizeParams(options.param),
      });

      process.stdout.write(installer.render());
    } catch (error) {
      reportError('Render', error);
      process.exit(1);
    }
  });
}
