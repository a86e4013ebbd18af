/**
 * structdiff config — View the effective configuration
 */

import chalk from 'chalk';
import { findConfigPath, loadConfig, loadConfigFile } from '../config.js';
import { errorMessage } from './diff.js';

interface ConfigOptions {
  json?: boolean;
  config?: string;
}

export async function configCommand(options: ConfigOptions = {}): Promise<void> {
  try {
    const configPath = options.config ?? findConfigPath();
    const config = options.config ? await loadConfigFile(options.config) : await loadConfig();

    if (options.json) {
      console.log(JSON.stringify(config, null, 2));
      return;
    }

    console.log();
    console.log(chalk.bold('structdiff Configuration'));
    console.log(chalk.dim(`   ${configPath ?? '(defaults)'}`));
    console.log();

    console.log(`  ${chalk.dim('Version:')}    ${config.version}`);
    console.log(`  ${chalk.dim('Sparse:')}     ${config.sparse ? 'yes' : 'no'}`);
    console.log(`  ${chalk.dim('Max items:')}  ${config.display.maxItems}`);
    console.log(`  ${chalk.dim('Color:')}      ${config.display.color ? 'yes' : 'no'}`);
    console.log();
  } catch (err) {
    console.error(chalk.red(`✗ ${errorMessage(err)}`));
    process.exitCode = 1;
  }
}
