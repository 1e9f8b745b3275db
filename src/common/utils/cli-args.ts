import { UsageError } from './error-handler';

export interface CliArgs {
  configPath?: string;
  help: boolean;
}

// Flags take one or two leading dashes: -config, --config, -help, --help
const HELP_FLAGS = ['h', 'help'];
const CONFIG_FLAG = 'config';

export function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = { help: false };

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    const match = /^--?([^=-][^=]*)(?:=(.*))?$/.exec(token);
    if (!match) {
      throw new UsageError(`Unknown argument: ${token}`, token);
    }

    const [, name, inlineValue] = match;

    if (HELP_FLAGS.includes(name) && inlineValue === undefined) {
      args.help = true;
      continue;
    }
    if (name === CONFIG_FLAG) {
      if (inlineValue !== undefined) {
        args.configPath = requireValue(inlineValue, token);
        continue;
      }
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('-')) {
        throw new UsageError(`Flag needs an argument: ${token}`, token);
      }
      args.configPath = value;
      i++;
      continue;
    }

    throw new UsageError(`Unknown argument: ${token}`, token);
  }

  return args;
}

function requireValue(value: string, token: string): string {
  if (!value) {
    throw new UsageError(`Flag needs an argument: ${token}`, token);
  }
  return value;
}
