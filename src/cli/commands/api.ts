import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import Table from 'cli-table3';
import { z } from 'zod';
import type { HassLinkContext } from '../../context.js';
import type { EntityState } from '../../types/home-assistant.js';
import { errorMessage } from '../../utils/errors.js';
import { checkMark, parsePositiveInt, reportError } from '../shared.js';
import type { ServerOption } from '../shared.js';

interface StatesOptions extends ServerOption {
  domain?: string;
  energy?: boolean;
}

interface HistoryCommandOptions extends ServerOption {
  hours: number;
}

interface CallServiceCommandOptions extends ServerOption {
  entity?: string;
  data?: Record<string, unknown>;
}

const serviceDataSchema = z.record(z.unknown());

function parseServiceData(value: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch (error) {
    throw new InvalidArgumentError(`--data is not valid JSON: ${errorMessage(error)}`);
  }
  const result = serviceDataSchema.safeParse(parsed);
  if (!result.success) {
    throw new InvalidArgumentError('--data must be a JSON object');
  }
  return result.data;
}

function printStates(states: EntityState[]): void {
  const table = new Table({ head: ['Entity', 'State', 'Name'] });
  for (const state of states) {
    const name = state.attributes.friendly_name;
    table.push([state.entity_id, state.state, typeof name === 'string' ? name : '']);
  }
  console.log(table.toString());
  console.log(chalk.dim(`${states.length} entities`));
}

export function registerApiCommands(program: Command, getContext: () => HassLinkContext) {
  // example: hass-link test-connection --server home
  program
    .command('test-connection')
    .description('Check the REST API, the SSH tunnel and the database behind it')
    .option('-s, --server <name>', 'Server name (default from config)')
    .action(async (options: ServerOption) => {
      console.log(chalk.bold('🔌 Testing connections...'));
      const failures: string[] = [];

      try {
        const config = await getContext().client(options.server).testConnection();
        const running = config.state === undefined || config.state === 'RUNNING';
        console.log(`${checkMark(running)} API: ${config.location_name ?? 'Unknown'} (version ${config.version ?? 'unknown'})`);
        if (!running) {
          failures.push(`API: hub state is ${config.state}`);
        }
      } catch (error) {
        console.log(`${checkMark(false)} API: ${errorMessage(error)}`);
        failures.push(`API: ${errorMessage(error)}`);
      }

      try {
        const tunnel = getContext().tunnels.get(options.server);
        const connected = await tunnel.ensureConnected();
        const status = await tunnel.status();
        console.log(`${checkMark(connected)} SSH tunnel: localhost:${status.localPort} -> ${status.remoteTarget} via ${status.sshEndpoint}`);
        console.log(`${checkMark(status.databaseResponding)} Database handshake`);
        if (!connected) {
          failures.push('SSH tunnel: failed to establish');
        } else if (!status.databaseResponding) {
          failures.push('Database: not responding');
        }
      } catch (error) {
        console.log(`${checkMark(false)} SSH tunnel: ${errorMessage(error)}`);
        failures.push(`SSH tunnel: ${errorMessage(error)}`);
      } finally {
        // An ssh child left running keeps the CLI from exiting
        await getContext().tunnels.stopAll();
      }

      if (failures.length > 0) {
        console.error(chalk.red(`\n✗ ${failures.length} check(s) failed`));
        process.exitCode = 1;
      } else {
        console.log(chalk.green('\n✓ All connections OK'));
      }
    });

  // example: hass-link states --domain light
  program
    .command('states')
    .description('List entity states')
    .option('-s, --server <name>', 'Server name (default from config)')
    .option('-d, --domain <domain>', 'Only entities of this domain, e.g. light')
    .option('--energy', 'Only energy related entities')
    .action(async (options: StatesOptions) => {
      try {
        const client = getContext().client(options.server);
        let states: EntityState[];
        if (options.energy) {
          states = await client.getEnergyEntities();
          if (options.domain) {
            const prefix = `${options.domain}.`;
            states = states.filter((state) => state.entity_id.startsWith(prefix));
          }
        } else if (options.domain) {
          states = await client.getEntitiesByDomain(options.domain);
        } else {
          states = await client.getStates();
        }
        printStates(states);
      } catch (error) {
        reportError(error);
      }
    });

  // example: hass-link history sensor.power_usage --hours 6
  program
    .command('history')
    .description('Show state changes of an entity')
    .argument('<entityId>', 'Entity id')
    .option('-s, --server <name>', 'Server name (default from config)')
    .option('--hours <n>', 'How far back to look', parsePositiveInt, 24)
    .action(async (entityId: string, options: HistoryCommandOptions) => {
      try {
        const history = await getContext().client(options.server).getHistory({
          entityId,
          startTime: new Date(Date.now() - options.hours * 60 * 60 * 1000),
        });
        const table = new Table({ head: ['Changed', 'State'] });
        for (const series of history) {
          for (const entry of series) {
            table.push([entry.last_changed ?? '', entry.state]);
          }
        }
        console.log(table.toString());
      } catch (error) {
        reportError(error);
      }
    });

  // example: hass-link call-service light turn_on --entity light.kitchen --data '{"brightness":128}'
  program
    .command('call-service')
    .description('Invoke a service on the hub')
    .argument('<domain>', 'Service domain, e.g. light')
    .argument('<service>', 'Service name, e.g. turn_on')
    .option('-s, --server <name>', 'Server name (default from config)')
    .option('-e, --entity <entityId>', 'Target entity id')
    .option('--data <json>', 'Extra service data as a JSON object', parseServiceData)
    .action(async (domain: string, service: string, options: CallServiceCommandOptions) => {
      try {
        await getContext().client(options.server).callService(domain, service, {
          entityId: options.entity,
          data: options.data,
        });
        console.log(chalk.green(`✓ Called ${domain}.${service}${options.entity ? ` on ${options.entity}` : ''}`));
      } catch (error) {
        reportError(error);
      }
    });
}
