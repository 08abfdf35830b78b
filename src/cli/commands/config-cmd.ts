import { Command } from 'commander';
import chalk from 'chalk';
import {
  getConfigSources,
  getGlobalConfigPath,
  getProjectConfigPath,
  hasProjectConfig,
  saveProjectConfig
} from '../../config/loader.js';
import { loadResolvedConfig } from '../../config/resolver.js';
import type { CourierConfig } from '../../config/types.js';
import { getErrorMessage } from '../../utils/error-utils.js';
import { print, redactLogData, type LogMetadata } from '../../utils/logger.js';

/**
 * Starter configuration written by `config init`
 */
export const STARTER_CONFIG: CourierConfig = {
  email: {
    provider: 'qq',
    smtp: {
      username: '${ENV:QQMAIL_USER}',
      password: '${ENV:QQMAIL_PASSWORD}',
      defaultSender: '${ENV:QQMAIL_USER}'
    },
    retryAttempts: 3,
    timeoutSeconds: 30
  },
  watching: {
    settings: {
      debounceDelaySeconds: 2,
      cooldownSeconds: 10,
      maxFileSizeMb: 100,
      sendEmailOnChange: true
    },
    directories: [
      {
        path: './inbox',
        recursive: false,
        enabled: true,
        notifyEmail: '${ENV:NOTIFY_EMAIL}',
        createIfMissing: true
      }
    ]
  },
  logging: {
    activityLog: 'logs/watcher_log.jsonl'
  }
};

function displayConfig(config: CourierConfig | null, title: string): void {
  if (!config || Object.keys(config).length === 0) {
    print(chalk.gray(`  ${title}: (empty)`));
    return;
  }

  const { meta } = redactLogData('', toMetadata(config));
  print(chalk.bold(`  ${title}:`));
  print(`  ${JSON.stringify(meta, null, 2).split('\n').join('\n  ')}`);
}

function toMetadata(config: CourierConfig): LogMetadata {
  const copy: LogMetadata = JSON.parse(JSON.stringify(config));
  return copy;
}

export function registerConfigCommands(program: Command): void {
  const configCommand = program
    .command('config')
    .description('Manage folder-courier configuration');

  configCommand
    .command('init')
    .description('Write a starter .courier/config.json')
    .option('-c, --config <path>', 'where to write the config file')
    .option('--force', 'Overwrite existing configuration')
    .action((options: { config?: string; force?: boolean }) => {
      if (hasProjectConfig({ configPath: options.config }) && !options.force) {
        print(chalk.yellow('⚠️  Configuration already exists at:'));
        print(chalk.cyan(`   ${getProjectConfigPath({ configPath: options.config })}`));
        print('Use --force to overwrite, or edit the file directly.');
        return;
      }

      const written = saveProjectConfig(STARTER_CONFIG, { configPath: options.config });
      print(chalk.green(`✓ Configuration written to ${written}`));
      print('');
      print('Next steps:');
      print(chalk.cyan('  export QQMAIL_USER=you@qq.com QQMAIL_PASSWORD=<auth code> NOTIFY_EMAIL=you@example.com'));
      print(chalk.cyan('  courier watch'));
    });

  configCommand
    .command('show')
    .description('Show the effective configuration and its sources')
    .option('-c, --config <path>', 'config file (default .courier/config.json)')
    .option('--sources', 'show each configuration source separately')
    .action((options: { config?: string; sources?: boolean }) => {
      try {
        if (options.sources) {
          const sources = getConfigSources({ configPath: options.config });
          print(chalk.bold('\n📋 Configuration sources\n'));
          displayConfig(sources.global, `Global (${getGlobalConfigPath()})`);
          displayConfig(sources.project, `Project (${getProjectConfigPath({ configPath: options.config })})`);
          displayConfig(sources.env, 'Environment');
          return;
        }

        const resolved = loadResolvedConfig({ configPath: options.config });
        print(chalk.bold('\n📋 Effective configuration\n'));
        print(`  Provider:        ${resolved.email.provider}`);
        print(`  SMTP host:       ${resolved.email.host ?? '(preset)'}`);
        print(`  Sender:          ${resolved.email.defaultSender || '(not configured)'}`);
        print(`  Debounce:        ${resolved.watcher.debounceMs / 1000}s`);
        print(`  Cooldown:        ${resolved.watcher.cooldownMs / 1000}s`);
        print(`  Send on change:  ${resolved.watcher.sendEmailOnChange ? 'yes' : 'no'}`);
        print(`  Activity log:    ${resolved.activityLogPath}`);
        print(`  Lock file:       ${resolved.lockFilePath}`);
        print('');
        print(chalk.bold('  Directories:'));
        if (resolved.directories.length === 0) {
          print(chalk.gray('    (none)'));
        }
        for (const directory of resolved.directories) {
          print(`    ${directory.path}${directory.enabled ? '' : chalk.yellow(' (disabled)')}`);
          print(chalk.gray(`      recursive: ${directory.recursive}, max size: ${(directory.maxFileSizeBytes / (1024 * 1024)).toFixed(0)} MB`));
          print(chalk.gray(`      notify: ${directory.notifyEmail || '(not configured)'}${directory.notifyOnChange ? '' : ' (off)'}`));
        }
        for (const issue of resolved.skippedDirectories) {
          print(chalk.red(`    entry #${issue.index} skipped: ${issue.message}`));
        }
      } catch (error) {
        console.error(chalk.red('❌ Invalid configuration:'), getErrorMessage(error));
        process.exit(1);
      }
    });

  configCommand
    .command('path')
    .description('Show configuration file locations')
    .option('-c, --config <path>', 'config file (default .courier/config.json)')
    .action((options: { config?: string }) => {
      print(`Project: ${getProjectConfigPath({ configPath: options.config })}`);
      print(`Global:  ${getGlobalConfigPath()}`);
    });
}
