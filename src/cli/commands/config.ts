/**
 * config command - Inspect and check coordinator configuration
 */

import { Command } from 'commander';
import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  CONFIG_FILE_NAME,
  findConfigFile,
  getDefaultConfig,
  loadConfig,
  saveConfig,
  validateConfig,
} from '../../utils/config.js';
import { errorMessage } from '../../errors.js';

export function createConfigCommand(): Command {
  const command = new Command('config')
    .description('Manage coordinator configuration');

  command
    .command('show')
    .description('Print the effective configuration')
    .option('-c, --config <path>', 'Configuration file')
    .action((options: { config?: string }) => {
      const path = options.config ?? findConfigFile();
      const config = loadConfig(options.config);

      console.error(path ? `# ${path}` : '# defaults (no config file found)');
      console.log(JSON.stringify(config, null, 2));
    });

  command
    .command('validate')
    .description('Validate a configuration file')
    .argument('[file]', 'Configuration file')
    .action((file?: string) => {
      const path = file ?? findConfigFile();
      if (!path || !existsSync(path)) {
        console.error(`No ${CONFIG_FILE_NAME} found`);
        process.exit(1);
        return;
      }

      let raw: unknown;
      try {
        raw = JSON.parse(readFileSync(path, 'utf-8'));
      } catch (error) {
        console.error(`Error: ${path} is not valid JSON: ${errorMessage(error)}`);
        process.exit(1);
        return;
      }

      const result = validateConfig(raw);
      if (!result.valid) {
        console.error(`${path} is invalid:`);
        for (const issue of result.errors ?? []) {
          console.error(`  - ${issue}`);
        }
        process.exit(1);
        return;
      }

      console.log(`${path} is valid`);
    });

  command
    .command('init')
    .description('Write a configuration file with the default values')
    .option('-f, --force', 'Overwrite existing configuration')
    .option('-d, --directory <path>', 'Directory to write to', process.cwd())
    .action((options: { force?: boolean; directory: string }) => {
      const path = join(options.directory, CONFIG_FILE_NAME);
      if (existsSync(path) && !options.force) {
        console.error(`${path} already exists. Use --force to overwrite.`);
        process.exit(1);
        return;
      }

      saveConfig(getDefaultConfig(), path);
      console.log(`Created ${path}`);
    });

  return command;
}
