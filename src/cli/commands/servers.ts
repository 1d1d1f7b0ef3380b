import { Command } from 'commander';
import chalk from 'chalk';
import Table from 'cli-table3';
import { serverUrl } from '../../config/server-config.js';
import type { HassLinkContext } from '../../context.js';
import { HassLinkError } from '../../utils/errors.js';
import { obfuscateToken } from '../../utils/dsn-obfuscate.js';
import { reportError } from '../shared.js';

function maskedToken(context: HassLinkContext, name: string): string {
  try {
    return obfuscateToken(context.credentials.credentials(name).token);
  } catch (error) {
    // Listing still works with missing secrets; anything else is a real failure
    if (error instanceof HassLinkError) {
      return chalk.red(error.code === 'MISSING_CREDENTIAL' ? 'missing' : 'no secrets');
    }
    throw error;
  }
}

export function registerServerCommands(program: Command, getContext: () => HassLinkContext) {
  // example: hass-link servers
  program
    .command('servers')
    .description('List configured servers')
    .action(() => {
      try {
        const context = getContext();
        const table = new Table({ head: ['Server', 'URL', 'Token', 'Default'] });
        for (const name of context.resolver.listServers()) {
          const server = context.resolver.serverConfig(name);
          table.push([
            name,
            serverUrl(server) ?? chalk.dim('(from secrets)'),
            maskedToken(context, name),
            server.isDefault ? chalk.green('yes') : '',
          ]);
        }
        console.log(table.toString());
      } catch (error) {
        reportError(error);
      }
    });
}
