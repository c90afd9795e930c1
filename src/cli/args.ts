import { UsageError } from '../utils/errors';

export interface CliOptions {
  hours: number | null;
  dryRun: boolean;
  opmlPath: string | null;
  help: boolean;
}

export const USAGE = `Usage: coverage-digest [options]

Send a daily PR coverage digest email.

Options:
  --hours <n>     Override lookback window in hours
  --dry-run       Print the email HTML instead of sending
  --opml <path>   Write the matched coverage to an OPML file for FreshRSS import
  -h, --help      Show this message`;

function parseHours(value: string | undefined): number {
  const hours = value === undefined || value.trim() === '' ? Number.NaN : Number(value);
  if (!Number.isFinite(hours) || hours <= 0) {
    throw new UsageError(`--hours expects a positive number, got: ${value ?? '(nothing)'}`);
  }
  return hours;
}

/**
 * Parse flags from `process.argv.slice(2)`. Accepts `--flag value` and `--flag=value`.
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { hours: null, dryRun: false, opmlPath: null, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.indexOf('=');
    const flag = arg.startsWith('--') && eq > 0 ? arg.slice(0, eq) : arg;
    const inline = arg.startsWith('--') && eq > 0 ? arg.slice(eq + 1) : undefined;
    const takeValue = (): string | undefined => {
      if (inline !== undefined) return inline;
      i++;
      return argv[i];
    };

    switch (flag) {
      case '--hours':
        options.hours = parseHours(takeValue());
        break;
      case '--dry-run':
        options.dryRun = true;
        break;
      case '--opml': {
        const path = takeValue();
        if (!path || path.startsWith('--')) {
          throw new UsageError('--opml expects a file path');
        }
        options.opmlPath = path;
        break;
      }
      case '-h':
      case '--help':
        options.help = true;
        break;
      default:
        throw new UsageError(`Unknown argument: ${arg}`);
    }
  }

  return options;
}
