/**
 * CLI Argument Parsing
 *
 * Parses command-line arguments for a snapshot run.
 * Values are kept raw here; config/app-config.ts validates them.
 */

/**
 * Snapshot configuration from CLI arguments
 */
export interface CliArgs {
  /** Page to open */
  url?: string;

  /** Paint highlight overlays (default: true) */
  highlight?: boolean;

  /** Maximum number of highlighted elements */
  maxHighlight?: string;

  /** Run browser in headless mode */
  headless?: boolean;

  /** Path to Chrome executable */
  executablePath?: string;

  /** Chrome channel to use */
  channel?: string;

  /** Number of highlight rebuilds after the first snapshot */
  refresh?: string;

  /** Delay between rebuilds in milliseconds */
  interval?: string;

  /** Output format: json (tree) or list (highlighted elements) */
  format?: string;

  logLevel?: string;
}

/** Flags that take the next argument as their value */
const VALUE_FLAGS = {
  '--url': 'url',
  '--maxHighlight': 'maxHighlight',
  '--executablePath': 'executablePath',
  '--channel': 'channel',
  '--refresh': 'refresh',
  '--interval': 'interval',
  '--format': 'format',
  '--logLevel': 'logLevel',
} as const satisfies Record<string, keyof CliArgs>;

function isValueFlag(arg: string): arg is keyof typeof VALUE_FLAGS {
  return Object.prototype.hasOwnProperty.call(VALUE_FLAGS, arg);
}

function parseBooleanFlag(arg: string, name: string): boolean | undefined {
  if (arg === `--${name}` || arg === `--${name}=true` || arg === `--${name}=1`) return true;
  if (arg === `--${name}=false` || arg === `--${name}=0`) return false;
  return undefined;
}

/**
 * Parse command-line arguments into CliArgs.
 *
 * A bare first positional argument is taken as the URL.
 *
 * @param argv - Command line arguments (process.argv.slice(2))
 */
export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    const highlight = parseBooleanFlag(arg, 'highlight');
    const headless = parseBooleanFlag(arg, 'headless');

    if (highlight !== undefined) {
      args.highlight = highlight;
    } else if (arg === '--no-highlight') {
      args.highlight = false;
    } else if (headless !== undefined) {
      args.headless = headless;
    } else if (isValueFlag(arg) && argv[i + 1] !== undefined) {
      args[VALUE_FLAGS[arg]] = argv[++i];
    } else if (arg.startsWith('--') && arg.includes('=')) {
      const separator = arg.indexOf('=');
      const flag = arg.slice(0, separator);
      if (isValueFlag(flag)) {
        args[VALUE_FLAGS[flag]] = arg.slice(separator + 1);
      } else {
        console.warn(`Warning: Unknown argument "${arg}" - ignored`);
      }
    } else if (!arg.startsWith('--') && args.url === undefined) {
      args.url = arg;
    } else {
      // Catches typos like --maxHighlights and flags missing their value
      console.warn(`Warning: Unknown argument "${arg}" - ignored`);
    }
  }

  return args;
}
