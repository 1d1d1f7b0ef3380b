#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { createContext } from '../context.js';
import type { HassLinkContext } from '../context.js';
import { registerApiCommands } from './commands/api.js';
import { registerDatabaseCommands } from './commands/database.js';
import { registerServerCommands } from './commands/servers.js';
import { registerTunnelCommands } from './commands/tunnel.js';

const program = new Command();

program
  .name('hass-link')
  .description('Home automation REST client and SSH database tunnel')
  .option('-c, --config <path>', 'Path to config.toml')
  .option('--secrets <path>', 'Path to secrets.toml');

// Global options are only known once parsing is done, so commands build the context on first use
let context: HassLinkContext | null = null;
const getContext = (): HassLinkContext => {
  if (!context) {
    const { config, secrets } = program.opts<{ config?: string; secrets?: string }>();
    context = createContext({ configPath: config, secretsPath: secrets });
  }
  return context;
};

registerServerCommands(program, getContext);
registerApiCommands(program, getContext);
registerTunnelCommands(program, getContext);
registerDatabaseCommands(program, getContext);

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(`✗ Error: ${error instanceof Error ? error.message : String(error)}`));
  process.exit(1);
});
