#!/usr/bin/env node
import { loadConfig } from '@/config';
import { EnvironmentError } from '@/config/environment';
import { createLogger, logManager } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';
import { InvalidTargetError } from '@/domain/errors';
import { ConsoleFrontend } from '@/adapters/console/consoleFrontend';
import { createRuntime } from '@/runtime/bootstrap';
import { CliUsageError, USAGE, parseCliArgs } from '@/runtime/cliArgs';
import { registerShutdownHandlers } from '@/runtime/shutdown';

async function main(argv: readonly string[]): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      process.stderr.write(`error: ${error.message}\n\n${USAGE}\n`);
      return 2;
    }
    throw error;
  }
  if (parsed.kind === 'help') {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }

  let config: ReturnType<typeof loadConfig>;
  try {
    config = loadConfig(parsed.options);
  } catch (error) {
    if (error instanceof InvalidTargetError || error instanceof EnvironmentError) {
      process.stderr.write(`error: ${error.message}\n`);
      return 2;
    }
    throw error;
  }

  logManager.configure({ level: config.logging.level, json: config.logging.json });
  const log = createLogger('Server');
  log.info('bootstrapping fm-dx relay', {
    server: config.endpoints.netloc,
    secure: config.endpoints.secure,
    stream: config.stream.enabled,
  });

  const runtime = createRuntime(config);
  const stop = () => {
    runtime.stop().catch((error: unknown) => {
      log.error('controller stop failed', { message: errorMessage(error) });
    });
  };
  const frontend = new ConsoleFrontend({
    updates: runtime.updates,
    commands: runtime.commands,
    output: process.stdout,
    onQuit: stop,
  });
  const detachInput = frontend.attachInput(process.stdin);
  const unregister = registerShutdownHandlers(runtime, log);

  runtime.start();
  try {
    await frontend.run();
    await runtime.done;
  } finally {
    detachInput();
    unregister();
  }

  const failure = runtime.failure();
  if (failure) {
    log.error('controller stopped after a fatal error', { failure });
    return 1;
  }
  log.info('controller stopped');
  return 0;
}

main(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    const log = createLogger('Server');
    log.error('fatal bootstrap error', { message: errorMessage(error) });
    process.exit(1);
  });
