/**
 * @fileoverview Command-line argument parsing.
 *
 * @module scoutline/cli/args
 */

export type CliCommand =
  | { readonly command: 'serve'; readonly port: number | undefined; readonly host: string | undefined; readonly verbose: boolean }
  | { readonly command: 'ask'; readonly message: string; readonly verbose: boolean }
  | { readonly command: 'tools' }
  | { readonly command: 'help' }
  | { readonly command: 'version' };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function parsePort(value: string | undefined): number {
  const port = Number(value);
  if (value === undefined || !Number.isInteger(port) || port < 0 || port > 65_535) {
    throw new UsageError(`Invalid port: ${value ?? '(missing)'}`);
  }
  return port;
}

/**
 * Parses `process.argv.slice(2)`. No arguments means `serve`.
 *
 * @throws UsageError on unknown commands, options or missing values
 */
export function parseArgs(args: ReadonlyArray<string>): CliCommand {
  const [command = 'serve', ...rest] = args;

  let port: number | undefined;
  let host: string | undefined;
  let verbose = false;
  const positional: string[] = [];

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    switch (arg) {
      case '-p':
      case '--port':
        port = parsePort(rest[++i]);
        break;

      case '--host': {
        const value = rest[++i];
        if (value === undefined) {
          throw new UsageError('Missing value for --host');
        }
        host = value;
        break;
      }

      case '--verbose':
        verbose = true;
        break;

      default:
        if (arg === undefined || arg.startsWith('-')) {
          throw new UsageError(`Unknown option: ${arg ?? ''}`);
        }
        positional.push(arg);
    }
  }

  switch (command) {
    case 'serve':
    case 'start':
      return { command: 'serve', port, host, verbose };

    case 'ask': {
      const message = positional.join(' ').trim();
      if (message === '') {
        throw new UsageError('ask needs a message, e.g. scoutline ask "What is trending?"');
      }
      return { command: 'ask', message, verbose };
    }

    case 'tools':
    case 'list':
      return { command: 'tools' };

    case '-h':
    case '--help':
    case 'help':
      return { command: 'help' };

    case '-v':
    case '--version':
    case 'version':
      return { command: 'version' };

    default:
      throw new UsageError(`Unknown command: ${command}`);
  }
}
