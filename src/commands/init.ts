/**
 * eln-migrate init: write a starter .eln-migrate/config.json
 */

import chalk from 'chalk';
import ora from 'ora';
import { defaultConfig, isInitialized, localConfigPath, saveConfig } from '../config.js';
import { errorMessage } from '../migrate/errors.js';

export async function initCommand(options: { force?: boolean } = {}): Promise<void> {
  console.log();
  console.log(chalk.bold('⚗  eln-migrate · Labfolder → eLabFTW'));
  console.log();

  if (isInitialized() && !options.force) {
    console.log(chalk.yellow('⚠  Already initialized in this directory.'));
    console.log(chalk.dim(`   Config: ${localConfigPath()}`));
    return;
  }

  const spinner = ora('Writing configuration...').start();
  try {
    const path = await saveConfig(defaultConfig());
    spinner.succeed(`Created ${path}`);
  } catch (err) {
    spinner.fail(`Could not write configuration: ${errorMessage(err)}`);
    process.exit(1);
  }

  console.log();
  console.log(chalk.dim('  Credentials are read from the environment or flags:'));
  console.log(chalk.dim('    LABFOLDER_USERNAME, LABFOLDER_PASSWORD, ELABFTW_URL, ELABFTW_API_KEY'));
  console.log();
  console.log(`  Next: ${chalk.cyan('eln-migrate migrate --dry-run')}`);
  console.log();
}
