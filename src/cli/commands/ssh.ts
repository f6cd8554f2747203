import { Command } from 'commander';
import chalk from 'chalk';
import { RemoteRunner } from '../../classes/remote-runner';
import { readEnvDefaults } from '../../lib/config';
import { ValidationError } from '../../lib/sanitization';
import {
  RemoteCommandOptions,
  reportError,
  resolveConnectOptions,
  resolveRemote,
} from './options';

export function registerSSHCommands(program: Command) {
  // example: npx tsx src/cli/index.ts ssh-test --remote-host 127.0.0.1 --ssh-user ubuntu --ssh-key ~/.ssh/id_rsa
  program
    .command('ssh-test')
    .description('Test SSH connection to a remote host')
    .option('--ssh-key <path>', 'Path to SSH private key file')
    .option('--ssh-user <username>', 'SSH username')
    .option('--remote-host <host>', 'Remote server hostname or IP address')
    .option('--passphrase <passphrase>', 'Passphrase for the private key')
    .option('--max-attempts <number>', 'Connection attempts (default: 20)')
    .option('--backoff <ms>', 'Wait between connection attempts (default: 1000)')
    .action(async (options: RemoteCommandOptions) => {
      console.log(chalk.bold('🔐 Testing SSH Connection...'));

      try {
        const env = readEnvDefaults();
        const credentials = resolveRemote(options, env);
        if (!credentials) {
          throw new ValidationError(
            'Remote host is required. Provide --remote-host or REMOTE_HOST'
          );
        }

        console.log(
          chalk.dim(`Connecting to ${credentials.username}@${credentials.host}:22\n`)
        );

        const runner = new RemoteRunner(
          credentials,
          resolveConnectOptions(options, env)
        );
        const output = await runner.run('echo "Connection test successful"');

        console.log(chalk.green('✅ SSH connection test successful!'));
        console.log(chalk.cyan(`   ${output.trim()}`));
      } catch (error) {
        reportError('SSH connection', error);
        process.exit(1);
      }
    });
}
