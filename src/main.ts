#!/usr/bin/env node
import { USAGE, parseCliArgs } from '@/cli/args';
import { loadConfig } from '@/config';
import { errorMessage } from '@/domain/errors';
import { createRuntime } from '@/runtime/bootstrap';
import { configureLogging } from '@/runtime/components';
import { runOneShot } from '@/runtime/oneShot';
import { createRuntimePorts } from '@/runtime/ports';
import { registerShutdownHandlers } from '@/runtime/shutdown';
import { createLogger, logManager } from '@/shared/logging/logger';

async function main(argv: readonly string[]): Promise<number | null> {
  const command = parseCliArgs(argv);
  if (command.kind === 'help') {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }
  if (command.kind === 'error') {
    process.stderr.write(`${command.message}\n\n${USAGE}\n`);
    return 1;
  }

  const appConfig = loadConfig();
  logManager.configure({ level: appConfig.env.logLevel });
  const ports = createRuntimePorts({ configPath: appConfig.configPath });
  const config = await ports.config.load();
  configureLogging(config, appConfig.logFilePath);

  switch (command.kind) {
    case 'clear':
    case 'register-uri':
    case 'spotify-login':
      return runOneShot(command.kind, ports);
    case 'join':
      return runOneShot({ join: command.uri }, ports);
    case 'host':
      break;
  }

  const runtime = createRuntime(ports, { assetsDir: appConfig.assetsDir });
  await runtime.start();
  const shutdown = registerShutdownHandlers(runtime);
  runtime.onExitRequested(() => {
    void shutdown('exit requested');
  });
  // Host mode keeps running; the shutdown handlers end the process.
  return null;
}

main(process.argv.slice(2))
  .then((code) => {
    if (code !== null) {
      process.exitCode = code;
    }
  })
  .catch((error: unknown) => {
    const log = createLogger('Runtime');
    log.error('fatal bootstrap error', { message: errorMessage(error) });
    process.exit(1);
  });
