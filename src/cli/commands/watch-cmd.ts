import path from 'path';
import { Command } from 'commander';
import chalk from 'chalk';
import { loadResolvedConfig, secondsToDebounceMs } from '../../config/resolver.js';
import { createEmailProvider } from '../../providers/index.js';
import { createWatchService } from '../../watcher/WatchService.js';
import { formatBatchSummary, formatClock } from '../../watcher/notification.js';
import type { DispatchedFile, DispatchResult } from '../../watcher/types.js';
import { ConfigError, InstanceLockError, getErrorMessage } from '../../utils/error-utils.js';
import { print } from '../../utils/logger.js';

interface WatchCommandOptions {
  config?: string;
  debounce?: string;
  cooldown?: string;
  flushOnExit?: boolean;
}

function stamp(): string {
  return chalk.gray(`[${formatClock(new Date())}]`);
}

function parseSeconds(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const seconds = Number.parseFloat(value);
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new ConfigError(`${flag} expects a non-negative number of seconds, got "${value}"`);
  }
  return seconds;
}

function reportProcess(files: DispatchedFile[]): void {
  print(`${stamp()} ${chalk.cyan('[PROCESS]')} ${formatBatchSummary(files)}`);
}

function reportDispatch(result: DispatchResult): void {
  switch (result.status) {
    case 'sent':
      print(`${stamp()} ${chalk.green('[SUCCESS]')} Email sent to ${result.recipient ?? ''} (${result.files.length} file(s) attached)`);
      break;
    case 'failed':
      print(`${stamp()} ${chalk.red('[ERROR]')} Email failed: ${result.error ?? 'Unknown error'}`);
      break;
    case 'skipped':
      if (result.reason === 'notifications-disabled') {
        print(`${stamp()} ${chalk.gray('[SKIP]')} Notifications are off for ${result.directory}`);
      }
      break;
  }
}

export function registerWatchCommand(program: Command): void {
  program
    .command('watch')
    .description('Watch configured directories and email changed files')
    .option('-c, --config <path>', 'config file (default .courier/config.json)')
    .option('-d, --debounce <seconds>', 'quiet period before a batch is sent')
    .option('--cooldown <seconds>', 'minimum time before a sent file can trigger again')
    .option('--flush-on-exit', 'send pending batches when stopping instead of dropping them')
    .action(async (options: WatchCommandOptions): Promise<void> => {
      try {
        const config = loadResolvedConfig({ configPath: options.config });

        const debounceSeconds = parseSeconds(options.debounce, '--debounce');
        const cooldownSeconds = parseSeconds(options.cooldown, '--cooldown');
        if (debounceSeconds !== undefined) {
          config.watcher.debounceMs = secondsToDebounceMs(debounceSeconds);
        }
        if (cooldownSeconds !== undefined) {
          config.watcher.cooldownMs = Math.round(cooldownSeconds * 1000);
        }

        const provider = createEmailProvider(config.email.provider, config.email);

        print(chalk.cyan.bold('\n📬 folder-courier'));
        print(chalk.gray(`   Provider:  ${provider.getName()}`));
        print(chalk.gray(`   Debounce:  ${config.watcher.debounceMs / 1000}s`));
        print(chalk.gray(`   Cooldown:  ${config.watcher.cooldownMs / 1000}s`));
        for (const directory of config.directories) {
          const state = directory.enabled ? '' : chalk.yellow(' (disabled)');
          print(chalk.gray(`   Watching:  ${directory.path}${directory.recursive ? ' (recursive)' : ''}${state}`));
          print(chalk.gray(`              → ${directory.notifyEmail || '(no recipient configured)'}`));
        }
        print('');

        const service = createWatchService(config, provider, {
          flushOnStop: Boolean(options.flushOnExit),
          onChange: ({ path: filePath, kind }) => {
            print(`${stamp()} ${chalk.blue('[DETECT]')} ${path.basename(filePath)} (${kind})`);
            print(`${stamp()} ${chalk.gray('[WAIT]')} Batching changes (waiting ${config.watcher.debounceMs / 1000}s)...`);
          },
          onProcess: (_directory, files) => reportProcess(files),
          onDispatch: reportDispatch
        });

        await service.start();
        print(chalk.green(`✅ Monitoring ${service.activeDirectories().length} directories. Press Ctrl+C to stop.`));

        await new Promise<void>((resolve, reject) => {
          const shutdown = (): void => {
            process.off('SIGINT', shutdown);
            process.off('SIGTERM', shutdown);
            print('\nStopping watcher...');
            service.stop()
              .then(() => provider.close())
              .then(() => {
                print('File watcher stopped.');
                resolve();
              }, reject);
          };

          process.on('SIGINT', shutdown);
          process.on('SIGTERM', shutdown);
        });
      } catch (error) {
        if (error instanceof InstanceLockError) {
          console.error(chalk.red('❌ Another file watcher instance is already running!'));
          console.error(chalk.gray(`   Stop process ${error.ownerPid} first or delete ${error.lockPath}`));
        } else {
          console.error(chalk.red('❌ Failed to start watcher:'), getErrorMessage(error));
        }
        process.exit(1);
      }
    });
}
