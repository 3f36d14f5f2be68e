/**
 * Argument parsing for the create-story command
 */

export interface CreateStoryArgs {
  topic: string;
  debug: boolean;
  verbose: boolean;
  help: boolean;
  timeoutMinutes?: number;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export const CREATE_STORY_USAGE = [
  'Usage: create-story [--debug|-d] [--verbose|-v] [--timeout|-t <minutes>] <story topic>',
  '',
  'Examples:',
  '  create-story "robot discovers emotions"',
  '  create-story "fox and owl solve mysteries in watercolor style"',
  '  create-story "space adventure, 10 pages"',
].join('\n');

export function parseCreateStoryArgs(argv: readonly string[]): CreateStoryArgs {
  const words: string[] = [];
  const args: CreateStoryArgs = { topic: '', debug: false, verbose: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    switch (arg) {
      case '--debug':
      case '-d':
        args.debug = true;
        break;
      case '--verbose':
      case '-v':
        args.verbose = true;
        break;
      case '--help':
      case '-h':
        args.help = true;
        break;
      case '--timeout':
      case '-t': {
        const value = argv[i + 1];
        const minutes = value === undefined ? NaN : Number(value);
        if (!Number.isInteger(minutes) || minutes <= 0) {
          throw new CliUsageError('--timeout requires a whole number of minutes');
        }
        args.timeoutMinutes = minutes;
        i++;
        break;
      }
      default:
        if (arg.startsWith('-') && arg.length > 1) {
          throw new CliUsageError(`Unknown option ${arg}`);
        }
        words.push(arg);
    }
  }

  args.topic = words.join(' ').trim();
  if (!args.topic && !args.help) {
    throw new CliUsageError('A story topic is required');
  }
  return args;
}
