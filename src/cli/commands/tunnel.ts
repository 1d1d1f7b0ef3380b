import { Command } from 'commander';
import chalk from 'chalk';
import type { HassLinkContext } from '../../context.js';
import { describeTunnelConfig } from '../../utils/dsn-obfuscate.js';
import { checkMark, parsePositiveInt, reportError } from '../shared.js';
import type { ServerOption } from '../shared.js';

interface TunnelUpOptions extends ServerOption {
  wait: number;
}

function waitForSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    process.once('SIGINT', () => resolve('SIGINT'));
    process.once('SIGTERM', () => resolve('SIGTERM'));
  });
}

export function registerTunnelCommands(program: Command, getContext: () => HassLinkContext) {
  const tunnel = program.command('tunnel').description('Manage the SSH tunnel to the database');

  // example: hass-link tunnel status
  tunnel
    .command('status')
    .description('Show whether the tunnel and the database behind it respond')
    .option('-s, --server <name>', 'Server name (default from config)')
    .action(async (options: ServerOption) => {
      try {
        const status = await getContext().tunnels.status(options.server);
        console.log(`${checkMark(status.tunnelActive)} Tunnel on localhost:${status.localPort}`);
        console.log(`${checkMark(status.databaseResponding)} Database at ${status.remoteTarget}`);
        console.log(chalk.dim(`  via ${status.sshEndpoint}`));
        if (!status.tunnelActive) {
          process.exitCode = 1;
        }
      } catch (error) {
        reportError(error);
      }
    });

  // example: hass-link tunnel up --wait 5
  tunnel
    .command('up')
    .description('Start the tunnel and keep it open until interrupted')
    .option('-s, --server <name>', 'Server name (default from config)')
    .option('-w, --wait <seconds>', 'Seconds to wait for the local port to open', parsePositiveInt, 3)
    .action(async (options: TunnelUpOptions) => {
      try {
        const sshTunnel = getContext().tunnels.get(options.server);
        console.log(chalk.dim(describeTunnelConfig(sshTunnel.getConfig())));

        if (!(await sshTunnel.start(options.wait))) {
          console.error(chalk.red('✗ Failed to start SSH tunnel'));
          process.exitCode = 1;
          return;
        }
        if (sshTunnel.getPid() === undefined) {
          console.log(chalk.yellow('Tunnel port is already open; leaving the existing tunnel alone'));
          return;
        }

        console.log(chalk.green(`✓ Tunnel up (ssh pid ${sshTunnel.getPid()}). Press Ctrl+C to close`));
        const reason = await Promise.race([waitForSignal(), sshTunnel.waitForExit().then(() => 'exit' as const)]);
        if (reason === 'exit') {
          console.error(chalk.red('✗ ssh exited'));
          process.exitCode = 1;
          return;
        }
        const closed = await sshTunnel.stop();
        console.log(closed ? chalk.green('✓ Tunnel closed') : chalk.yellow('Tunnel port is still open'));
      } catch (error) {
        reportError(error);
      }
    });

  // example: hass-link tunnel stop --server cabin
  tunnel
    .command('stop')
    .description('Stop ssh processes forwarding this tunnel\'s port to the database host')
    .option('-s, --server <name>', 'Server name (default from config)')
    .action(async (options: ServerOption) => {
      try {
        const stopped = await getContext().tunnels.get(options.server).stop();
        console.log(stopped ? chalk.green('✓ Tunnel stopped') : chalk.yellow('Tunnel port is still open'));
        if (!stopped) {
          process.exitCode = 1;
        }
      } catch (error) {
        reportError(error);
      }
    });
}
