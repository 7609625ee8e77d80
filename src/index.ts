#!/usr/bin/env node
/**
 * taleloom - plays sigil-prefixed branching story scripts on the console
 */

import { parseArgs } from './cli/args.js';
import { createEngineContext, runScript } from './core/engine.js';
import { createStdConsole } from './io/console.js';
import {
  formatDuration,
  printError,
  printInfo,
  printWarning,
} from './output/colors.js';
import { createLogger } from './output/logger.js';
import {
  checkScript,
  type Diagnostic,
  formatDiagnostic,
  formatScriptError,
  hasErrors,
  loadScript,
  scanScript,
  ScriptError,
} from './script/index.js';
import { DEFAULT_CONFIG, type InterpreterConfig } from './types/config.js';
import { EXIT_FAILURE, EXIT_SUCCESS } from './utils/constants.js';

/**
 * Print check results; warnings are hidden in quiet mode
 */
function reportDiagnostics(
  file: string,
  diagnostics: Diagnostic[],
  config: InterpreterConfig
): void {
  for (const diagnostic of diagnostics) {
    const text = formatDiagnostic(file, diagnostic);
    if (diagnostic.severity === 'error') {
      printError(text);
    } else if (config.verbosity !== 'quiet') {
      printWarning(text);
    }
  }
}

async function main(): Promise<number> {
  const startTime = Date.now();
  const parsed = parseArgs(process.argv.slice(2));

  // Merge config with defaults
  const config: InterpreterConfig = {
    ...DEFAULT_CONFIG,
    ...parsed.config,
  };

  const script = loadScript(parsed.scriptFile);
  const scan = scanScript(script, { strict: config.strict });

  if (config.checkOnly) {
    const diagnostics = checkScript(script, scan);
    reportDiagnostics(script.path, diagnostics, config);
    if (config.verbosity === 'verbose') {
      printInfo(
        `Checked ${script.lines.length} lines: ${diagnostics.length} finding(s)`
      );
    }
    return hasErrors(diagnostics) ? EXIT_FAILURE : EXIT_SUCCESS;
  }

  const logger = createLogger(config.enableLog, config.logDir, script.path);

  if (config.verbosity === 'verbose') {
    printInfo(
      `Script: ${script.path} | Lines: ${script.lines.length} | Labels: ${scan.labels.size} | Variables: ${scan.variables.size}`
    );
    if (logger.filePath) {
      printInfo(`Log: ${logger.filePath}`);
    }
  }

  for (const diagnostic of scan.diagnostics) {
    logger.logEvent({
      event: 'scan_diagnostic',
      kind: diagnostic.kind,
      line: diagnostic.index + 1,
      message: diagnostic.message,
    });
  }

  const io = createStdConsole();
  const context = createEngineContext(script, scan);

  try {
    const result = await runScript(context, { io, logger });

    if (result.status === 'error') {
      printError(formatScriptError(result.error));
      return EXIT_FAILURE;
    }

    if (config.verbosity === 'verbose') {
      printInfo(
        `Story complete: ${result.steps} steps in ${formatDuration(Date.now() - startTime)}`
      );
    }
    return EXIT_SUCCESS;
  } finally {
    io.close();
    logger.close();
  }
}

// Run main
main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    if (err instanceof ScriptError) {
      printError(formatScriptError(err));
    } else {
      const message = err instanceof Error ? err.message : String(err);
      printError(`Error: ${message}`);
    }
    process.exitCode = EXIT_FAILURE;
  }
);
