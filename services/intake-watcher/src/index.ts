/**
 * Intake Watcher Service
 *
 * Verifies the OCR engine, prepares the working directories, then watches
 * the intake directory until SIGINT/SIGTERM.
 */

import type { Server } from 'node:http';
import {
  logger,
  loadConfig,
  validateConfig,
  resolveTesseract,
  TesseractEngine,
  createPipeline,
  ensureWorkingDirectories,
  DirectoryWatcher,
  serveMetrics,
  StartupPreconditionError,
  errorMessage,
  type Config,
} from '@poscan/shared';
import { USAGE, parseCliArguments, type CliArguments } from './lib/args';

export const EXIT_OK = 0;
export const EXIT_STARTUP_FAILURE = 1;

export interface RunOptions {
  /**
   * Resolves with the signal name once the process should stop.
   * Defaults to the first SIGINT or SIGTERM.
   */
  untilShutdown?: () => Promise<string>;
}

function waitForSignal(): Promise<string> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve(signal);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
}

function parseArguments(argv: string[]): CliArguments {
  try {
    return parseCliArguments(argv);
  } catch (error) {
    throw new StartupPreconditionError(errorMessage(error), { cause: error });
  }
}

function buildConfig(argv: string[], env: NodeJS.ProcessEnv): Config | null {
  const cli = parseArguments(argv);

  if (cli.help) {
    process.stdout.write(USAGE);
    return null;
  }

  const config = loadConfig(env, cli.overrides);
  const validation = validateConfig(config);
  if (!validation.valid) {
    throw new StartupPreconditionError(
      `Invalid configuration: ${(validation.errors || []).join('; ')}`
    );
  }
  return config;
}

interface RunningWatcher {
  watcher: DirectoryWatcher;
  metricsServer: Server | null;
}

async function startWatching(config: Config): Promise<RunningWatcher> {
  // Fatal before any watching begins
  const location = resolveTesseract({
    tesseractCmd: config.tesseractCmd,
    tessdataPath: config.tessdataPath,
    language: config.ocrLanguage,
  });

  await ensureWorkingDirectories(config);

  const engine = new TesseractEngine({
    ...location,
    language: config.ocrLanguage,
    timeoutMs: config.ocrTimeoutMs,
  });
  const pipeline = createPipeline(config, { engine });
  const watcher = new DirectoryWatcher({ directory: config.intakeDirectory, handler: pipeline });

  watcher.start();
  const metricsServer = config.metricsPort ? serveMetrics(config.metricsPort) : null;

  logger.info('Intake watcher started', {
    intakeDirectory: config.intakeDirectory,
    finishedDirectory: config.finishedDirectory,
    errorDirectory: config.errorDirectory,
  });

  return { watcher, metricsServer };
}

/**
 * Start the watcher and keep it running until shutdown.
 *
 * @returns The process exit code: 0 after a clean shutdown (or --help),
 *   1 when a startup precondition failed and nothing was watched
 */
export async function run(
  argv: string[],
  env: NodeJS.ProcessEnv,
  options: RunOptions = {}
): Promise<number> {
  let running: RunningWatcher | null = null;

  try {
    const config = buildConfig(argv, env);
    if (!config) return EXIT_OK;
    running = await startWatching(config);
  } catch (error) {
    logger.error('Startup failed', error);
    return EXIT_STARTUP_FAILURE;
  }

  // Graceful shutdown
  const signal = await (options.untilShutdown ?? waitForSignal)();
  logger.info(`${signal} received, stopping directory monitoring`);
  await running.watcher.stop();
  running.metricsServer?.close();

  return EXIT_OK;
}

if (require.main === module) {
  run(process.argv.slice(2), process.env).then(
    (exitCode) => process.exit(exitCode),
    (error: unknown) => {
      logger.error('Intake watcher crashed', error);
      process.exit(EXIT_STARTUP_FAILURE);
    }
  );
}
