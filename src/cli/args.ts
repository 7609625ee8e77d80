/**
 * CLI argument parsing
 */

import { createRequire } from 'module';

const require = createRequire(import.meta.url);
const pkg = require('../../package.json') as { version: string };
import type {
  InterpreterConfig,
  ParsedArgs,
  Verbosity,
} from '../types/config.js';
import { EXIT_FAILURE, EXIT_SUCCESS } from '../utils/constants.js';

const USAGE = 'Usage: taleloom [options] <script>';

interface RawArgs {
  positionalArgs: string[];
  config: Partial<InterpreterConfig>;
}

function fail(message: string): never {
  console.error(`Error: ${message}`);
  console.error(USAGE);
  process.exit(EXIT_FAILURE);
}

/**
 * Extract options from raw args, returning positional args and config
 */
function extractOptions(args: string[]): RawArgs {
  // Handle --version and --help early
  if (args.includes('--version') || args.includes('-V')) {
    console.log(pkg.version);
    process.exit(EXIT_SUCCESS);
  }
  if (args.includes('--help') || args.includes('-h')) {
    printUsage();
    process.exit(EXIT_SUCCESS);
  }

  let verbosity: Verbosity | undefined;
  let enableLog: boolean | undefined;
  let logDir: string | undefined;
  let strict: boolean | undefined;
  let checkOnly: boolean | undefined;
  const positionalArgs: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    if (arg === '--quiet') {
      verbosity = 'quiet';
    } else if (arg === '--normal') {
      verbosity = 'normal';
    } else if (arg === '--verbose') {
      verbosity = 'verbose';
    } else if (arg === '--log') {
      enableLog = true;
    } else if (arg === '--log-dir') {
      const dir = args[++i];
      if (!dir) {
        fail('--log-dir requires a directory');
      }
      logDir = dir;
      enableLog = true;
    } else if (arg.startsWith('--log-dir=')) {
      logDir = arg.slice(10);
      enableLog = true;
    } else if (arg === '--strict') {
      strict = true;
    } else if (arg === '--check') {
      checkOnly = true;
    } else if (arg.startsWith('-') && arg !== '-') {
      fail(`unknown option '${arg}'`);
    } else {
      positionalArgs.push(arg);
    }
  }

  // Only options that were given, so defaults are not overridden
  const config: Partial<InterpreterConfig> = {};
  if (verbosity !== undefined) config.verbosity = verbosity;
  if (enableLog !== undefined) config.enableLog = enableLog;
  if (logDir !== undefined) config.logDir = logDir;
  if (strict !== undefined) config.strict = strict;
  if (checkOnly !== undefined) config.checkOnly = checkOnly;

  return { positionalArgs, config };
}

/**
 * Parse CLI arguments
 */
export function parseArgs(args: string[]): ParsedArgs {
  const { positionalArgs, config } = extractOptions(args);

  const [scriptFile, ...extra] = positionalArgs;

  if (!scriptFile) {
    fail('script file required');
  }

  if (extra.length > 0) {
    fail(`unexpected argument '${extra.join(' ')}'`);
  }

  return { scriptFile, config };
}

/**
 * Print usage information
 */
export function printUsage(): void {
  console.log(`
taleloom - plays sigil-prefixed branching story scripts

${USAGE}

Script lines:
  :label                     Label declaration
  @name=value                Declare / assign a variable (numeric expressions are evaluated)
  !left==right:then[:else]   Conditional (== != < > <= >=); branches are #label, @name=value or text
  #label                     Go to label
  ?prompt:#label             Menu choice (consecutive lines form one menu)
  ^iprompt:@name             Ask for a number
  ^sprompt:@name             Ask for text
  |                          Blank line
  *comment                   Ignored
  anything else              Printed, with @name replaced by its value

Options:
  --check              Check the script for errors without running it
  --strict             Treat duplicate labels and malformed declarations as errors
  --log                Write an event log to ./logs
  --log-dir <dir>      Write the event log to <dir>
  --quiet              Only show errors
  --normal             Default output level
  --verbose            Show script details and a run summary on stderr
  --version, -V        Show version
  --help, -h           Show this help
`);
}
