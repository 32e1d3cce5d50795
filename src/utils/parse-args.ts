import { UsageError } from '../domain/errors';
import type { ConfigOverrides } from './load-config';

export type ParsedArgs = {
  help: boolean;
  showName: string | null;
  installFuse: boolean;
  list: boolean;
  createDesktop: boolean;
  removeName: string | null;
  assumeYes: boolean;
  overrides: ConfigOverrides;
  tokens: string[];
};

const HELP_FLAGS = new Set(['-h', '--help']);

const VALUE_OPTIONS = {
  '-s': 'showName',
  '--show-desktop': 'showName',
  '-r': 'removeName',
  '--remove': 'removeName',
  '--apps-dir': 'bundleDirectory',
  '--desktop-dir': 'descriptorDirectory',
  '--icon-dir': 'iconDirectory',
} as const;

type ValueOption = keyof typeof VALUE_OPTIONS;

const isValueOption = (token: string): token is ValueOption =>
  Object.prototype.hasOwnProperty.call(VALUE_OPTIONS, token);

const emptyArgs = (): ParsedArgs => ({
  help: false,
  showName: null,
  installFuse: false,
  list: false,
  createDesktop: false,
  removeName: null,
  assumeYes: false,
  overrides: {},
  tokens: [],
});

/**
 * No arguments at all is a help request. `-h` anywhere before `--` wins over
 * everything else, including otherwise malformed arguments.
 */
export const parseArgs = (argv: string[]): ParsedArgs => {
  const parsed = emptyArgs();

  const terminator = argv.indexOf('--');
  const optionZone = terminator === -1 ? argv : argv.slice(0, terminator);
  if (argv.length === 0 || optionZone.some((token) => HELP_FLAGS.has(token))) {
    parsed.help = true;
    return parsed;
  }

  let index = 0;
  while (index < argv.length) {
    const token = argv[index] ?? '';

    if (token === '--') {
      parsed.tokens.push(...argv.slice(index + 1));
      break;
    }

    const [flag, inlineValue] = splitInlineValue(token);
    if (isValueOption(flag)) {
      const value = inlineValue ?? argv[index + 1];
      if (value === undefined || value === '' || (inlineValue === undefined && value.startsWith('-'))) {
        throw new UsageError(`Option ${flag} requires a value`);
      }
      assignValue(parsed, flag, value);
      index += inlineValue === undefined ? 2 : 1;
      continue;
    }

    switch (token) {
      case '-i':
      case '--install-libfuse2':
        parsed.installFuse = true;
        break;
      case '-c':
      case '--create-desktop':
        parsed.createDesktop = true;
        break;
      case '-l':
      case '--list':
        parsed.list = true;
        break;
      case '-y':
      case '--yes':
        parsed.assumeYes = true;
        break;
      default:
        if (token.startsWith('-') && token !== '-') {
          throw new UsageError(`Unknown option: ${token}`);
        }
        parsed.tokens.push(token);
    }
    index += 1;
  }

  return parsed;
};

const splitInlineValue = (token: string): [string, string | undefined] => {
  if (!token.startsWith('--')) {
    return [token, undefined];
  }
  const equalsIndex = token.indexOf('=');
  if (equalsIndex === -1) {
    return [token, undefined];
  }
  return [token.slice(0, equalsIndex), token.slice(equalsIndex + 1)];
};

const assignValue = (parsed: ParsedArgs, flag: ValueOption, value: string) => {
  const target = VALUE_OPTIONS[flag];
  switch (target) {
    case 'showName':
      parsed.showName = value;
      break;
    case 'removeName':
      parsed.removeName = value;
      break;
    default:
      parsed.overrides[target] = value;
  }
};
