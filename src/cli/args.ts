/**
 * Command-line flags
 *
 * @module cli/args
 */

export const VERSION = '0.1.0';

export const HELP = `
paper-sync v${VERSION}

Watches a Google Drive folder for new PDF papers, summarizes each with Gemini
and files the summary in a Notion database.

Usage
  paper-sync [options]

Options
  --once                    Run a single cycle and exit
  --check-schema            Verify the Notion database has every mapped property
  --status                  Show processed documents and the ones still failing
  --migrate-legacy <path>   Import ids from a plain-text list (one id per line)
  --help, -h                Show this help

Without options the folder is checked every CHECK_INTERVAL seconds until
interrupted (Ctrl+C).

Examples
  paper-sync --once
  paper-sync --migrate-legacy processed_files.txt
`;

export type CliCommand =
  | { kind: 'run'; once: boolean }
  | { kind: 'check-schema' }
  | { kind: 'status' }
  | { kind: 'migrate-legacy'; path: string }
  | { kind: 'help' };

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

function combine(current: CliCommand | undefined, next: CliCommand, flag: string): CliCommand {
  if (current !== undefined && current.kind !== next.kind) {
    throw new CliUsageError(`${flag} cannot be combined with --${current.kind}`);
  }
  return next;
}

/**
 * @param args process.argv without the node and script entries
 * @throws CliUsageError on an unknown flag, a missing value or conflicting commands
 */
export function parseArgs(args: string[]): CliCommand {
  let once = false;
  let command: CliCommand | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--help':
      case '-h':
        return { kind: 'help' };
      case '--once':
        once = true;
        break;
      case '--check-schema':
        command = combine(command, { kind: 'check-schema' }, arg);
        break;
      case '--status':
        command = combine(command, { kind: 'status' }, arg);
        break;
      case '--migrate-legacy': {
        const value = args[i + 1];
        if (value === undefined || value.startsWith('--')) {
          throw new CliUsageError('--migrate-legacy requires a file path');
        }
        command = combine(command, { kind: 'migrate-legacy', path: value }, arg);
        i++;
        break;
      }
      default:
        throw new CliUsageError(`Unknown option: ${arg}`);
    }
  }

  if (command === undefined) return { kind: 'run', once };
  if (once) {
    throw new CliUsageError(`--once cannot be combined with --${command.kind}`);
  }
  return command;
}
