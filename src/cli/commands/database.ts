import { Command } from 'commander';
import chalk from 'chalk';
import { checkDatabase } from '../../connectors/mariadb.js';
import type { HassLinkContext } from '../../context.js';
import { reportError } from '../shared.js';
import type { ServerOption } from '../shared.js';

export function registerDatabaseCommands(program: Command, getContext: () => HassLinkContext) {
  // example: hass-link db-check --server home
  program
    .command('db-check')
    .description('Open the tunnel if needed and query the recorder database')
    .option('-s, --server <name>', 'Server name (default from config)')
    .action(async (options: ServerOption) => {
      try {
        const databaseConfig = getContext().credentials.databaseConfig(options.server);
        if (!(await getContext().tunnels.ensure(options.server))) {
          console.error(chalk.red('✗ SSH tunnel is not available'));
          process.exitCode = 1;
          return;
        }

        const result = await checkDatabase(databaseConfig);
        console.log(chalk.green(`✓ ${result.version}`));
        console.log(`  states_meta rows: ${result.statesMetaCount}`);
        if (!/mariadb/i.test(result.version)) {
          console.log(chalk.yellow(`  Expected MariaDB, got ${result.version}`));
        }
        if (result.statesMetaCount === 0) {
          console.log(chalk.yellow('  states_meta is empty'));
        }
      } catch (error) {
        reportError(error);
      } finally {
        await getContext().tunnels.stopAll();
      }
    });
}
