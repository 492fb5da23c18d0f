import type { Command } from 'commander';
import chalk from 'chalk';
import {
  DEFAULT_KEYS,
  getConfigPath,
  isDefaultKey,
  loadConfig,
  parseDefault,
  saveConfig,
} from '../config.js';

export function registerConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description('Manage default render options');

  config
    .command('show')
    .description('Show current configuration')
    .action(() => {
      const cfg = loadConfig();
      console.log(chalk.cyan('Config path:'), getConfigPath());
      const entries = Object.entries(cfg.defaults);
      if (entries.length === 0) {
        console.log(chalk.gray('No defaults set.'));
        return;
      }
      for (const [key, value] of entries) {
        console.log(chalk.cyan(`${key}:`), String(value));
      }
    });

  config
    .command('set')
    .description('Set a default render option')
    .argument('<key>', `One of: ${DEFAULT_KEYS.join(', ')}`)
    .argument('<value>', 'Option value')
    .action((key: string, value: string, _opts: unknown, cmd: Command) => {
      if (!isDefaultKey(key)) {
        cmd.error(chalk.red(`Unknown option: ${key}. Use ${DEFAULT_KEYS.join(', ')}.`));
      }
      const parsed = parseDefault(key, value);
      if (!parsed.ok) {
        cmd.error(chalk.red(`Invalid value for ${key}: ${parsed.error}`));
      }
      const cfg = loadConfig();
      cfg.defaults = { ...cfg.defaults, ...parsed.defaults };
      saveConfig(cfg);
      console.log(chalk.green(`${key} set to ${value}`));
    });

  config
    .command('unset')
    .description('Remove a default render option')
    .argument('<key>', `One of: ${DEFAULT_KEYS.join(', ')}`)
    .action((key: string, _opts: unknown, cmd: Command) => {
      if (!isDefaultKey(key)) {
        cmd.error(chalk.red(`Unknown option: ${key}. Use ${DEFAULT_KEYS.join(', ')}.`));
      }
      const cfg = loadConfig();
      delete cfg.defaults[key];
      saveConfig(cfg);
      console.log(chalk.green(`${key} unset`));
    });
}
