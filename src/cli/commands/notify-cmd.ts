import { Command } from 'commander';
import chalk from 'chalk';
import { loadResolvedConfig } from '../../config/resolver.js';
import { createEmailProvider } from '../../providers/index.js';
import { formatTimestamp } from '../../watcher/notification.js';
import { getErrorMessage } from '../../utils/error-utils.js';
import { print } from '../../utils/logger.js';

interface NotifyTestOptions {
  config?: string;
  attach?: string[];
  verify?: boolean;
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function registerNotifyCommands(program: Command): void {
  const notifyCommand = program
    .command('notify')
    .description('Check the configured email provider');

  notifyCommand
    .command('test <recipient>')
    .description('Send a test email through the configured provider')
    .option('-c, --config <path>', 'config file (default .courier/config.json)')
    .option('-a, --attach <file>', 'attach a file (repeatable)', collect)
    .option('--verify', 'verify the SMTP connection before sending')
    .action(async (recipient: string, options: NotifyTestOptions): Promise<void> => {
      try {
        const config = loadResolvedConfig({ configPath: options.config });
        const provider = createEmailProvider(config.email.provider, config.email);

        if (options.verify) {
          print(chalk.gray(`Connecting to ${provider.getName()}...`));
          if (!(await provider.verify())) {
            console.error(chalk.red('❌ Connection check failed'));
            process.exitCode = 1;
            await provider.close();
            return;
          }
        }

        const result = await provider.send({
          to: recipient,
          subject: 'folder-courier test message',
          text: `This is a test message sent at ${formatTimestamp(new Date())}.\n`,
          attachments: options.attach ?? []
        });
        await provider.close();

        if (result.success) {
          print(chalk.green(`✓ Sent via ${result.provider} (message id ${result.messageId})`));
        } else {
          console.error(chalk.red(`❌ Send failed via ${result.provider}:`), result.error);
          process.exitCode = 1;
        }
      } catch (error) {
        console.error(chalk.red('❌ Failed to send test email:'), getErrorMessage(error));
        process.exit(1);
      }
    });
}
