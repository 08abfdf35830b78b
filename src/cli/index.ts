import 'dotenv/config';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { Command } from 'commander';
import { registerConfigCommands } from './commands/config-cmd.js';
import { registerNotifyCommands } from './commands/notify-cmd.js';
import { registerWatchCommand } from './commands/watch-cmd.js';

function readPackageVersion(): string {
  const __filename = fileURLToPath(import.meta.url);
  const __dirname = path.dirname(__filename);
  const packageJsonPath = path.join(__dirname, '..', '..', 'package.json');
  const packageJson: { version?: string } = JSON.parse(fs.readFileSync(packageJsonPath, 'utf8'));
  return packageJson.version ?? '0.0.0';
}

export async function runCli(argv = process.argv): Promise<void> {
  const program = new Command();

  program
    .name('courier')
    .description('folder-courier - email changed files from watched directories')
    .version(readPackageVersion());

  registerWatchCommand(program);
  registerConfigCommands(program);
  registerNotifyCommands(program);

  if (!argv || argv.length <= 2) {
    program.help();
    return;
  }

  await program.parseAsync(argv);
}
