#!/usr/bin/env node
import { config } from 'dotenv';
import { UniFiFacts } from './index.js';
import { parseCommandLine } from './args.js';
import { ConfigurationError, loadControllerConfig } from './config.js';
import { DEFAULT_QUERY, QUERY_NAMES } from './local/queries.js';

config();

function usage() {
  console.log('UniFi Controller Facts\n');
  console.log('Usage: unifi-facts [query] [options]\n');
  console.log(`Runs one read-only query (default: ${DEFAULT_QUERY}) and prints the result as JSON.\n`);
  console.log('Options:');
  console.log('  --site <name>          Site to query (default: UNIFI_CONTROLLER_SITE or "default")');
  console.log('  --since <hours>        History window for guest, user, rogue AP, payment and event queries');
  console.log('  --start-num <n>        First event to return (list_events)');
  console.log('  --limit-num <n>        Maximum events to return (list_events)');
  console.log('  --start-epoch <t>      Window start (seconds for sessions, milliseconds for reports)');
  console.log('  --end-epoch <t>        Window end');
  console.log('  --created-time <t>     Voucher creation time (stat_vouchers)');
  console.log('  --device-mac <mac>     Restrict to one device');
  console.log('  --client-mac <mac>     Restrict to one client');
  console.log('  --network-id <id>      Restrict to one network (list_network_configuration)');
  console.log('  --wlan-id <id>         Restrict to one WLAN (list_wlan_configuration)');
  console.log('  --list                 Print the supported query names');
  console.log('\nConnection settings come from UNIFI_CONTROLLER_* variables (see .env.example).');
}

async function main() {
  try {
    const commandLine = parseCommandLine(process.argv.slice(2));

    if (commandLine.help) {
      usage();
      return;
    }

    if (commandLine.list) {
      QUERY_NAMES.forEach((name) => console.log(name));
      return;
    }

    const controller = loadControllerConfig();
    const facts = new UniFiFacts({ ...controller, site: commandLine.site ?? controller.site });

    const outcome = await facts.query(commandLine.query, commandLine.options);
    console.log(JSON.stringify(outcome, null, 2));
    process.exitCode = outcome.success ? 0 : 1;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(error.message);
      process.exitCode = 2;
      return;
    }
    throw error;
  }
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
