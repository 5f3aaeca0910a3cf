import { parseArgs } from 'util';
import { ConfigurationError, parseQueryOptions } from './config.js';
import { DEFAULT_QUERY } from './local/queries.js';
import { QueryOptions } from './types/index.js';

export interface CommandLine {
  query: string;
  site?: string;
  options: QueryOptions;
  list: boolean;
  help: boolean;
}

function isParseArgsError(error: unknown): error is Error & { code: string } {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith('ERR_PARSE_ARGS')
  );
}

/**
 * Unknown flags and malformed option values both surface as
 * ConfigurationError.
 */
export function parseCommandLine(argv: string[]): CommandLine {
  try {
    const { values, positionals } = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        'site': { type: 'string' },
        'since': { type: 'string' },
        'start-num': { type: 'string' },
        'limit-num': { type: 'string' },
        'start-epoch': { type: 'string' },
        'end-epoch': { type: 'string' },
        'created-time': { type: 'string' },
        'device-mac': { type: 'string' },
        'client-mac': { type: 'string' },
        'network-id': { type: 'string' },
        'wlan-id': { type: 'string' },
        'list': { type: 'boolean' },
        'help': { type: 'boolean', short: 'h' },
      },
    });

    const options = parseQueryOptions({
      since: values.since,
      startNum: values['start-num'],
      limitNum: values['limit-num'],
      startEpoch: values['start-epoch'],
      endEpoch: values['end-epoch'],
      createdTime: values['created-time'],
      deviceMac: values['device-mac'],
      clientMac: values['client-mac'],
      networkId: values['network-id'],
      wlanId: values['wlan-id'],
    });

    return {
      query: positionals[0] ?? DEFAULT_QUERY,
      site: values.site,
      options,
      list: values.list ?? false,
      help: values.help ?? false,
    };
  } catch (error) {
    if (isParseArgsError(error)) {
      throw new ConfigurationError([error.message]);
    }
    throw error;
  }
}
