import { type EngineEnv, validateEngineEnv } from '../env.js';
import { errorResponseFor } from '../errors.js';
import { createLogger } from '../logger.js';
import { printJson } from './utils.js';
import { commands } from './registry.js';

/** Runs one CLI command and resolves to the process exit code. */
export async function runCli(
  argv: string[],
  processEnv: NodeJS.ProcessEnv = process.env
): Promise<number> {
  const [cmd = '', ...args] = argv;
  const fn = commands[cmd];

  if (!fn) {
    console.error(`Unknown command: ${cmd}\n\nAvailable:\n  ${Object.keys(commands).join('\n  ')}`);
    return 1;
  }

  let env: EngineEnv;
  try {
    env = validateEngineEnv(processEnv);
  } catch (err) {
    printJson(errorResponseFor(err));
    return 1;
  }

  const log = createLogger({ level: env.logLevel, name: 'dutystack-cli', toStderr: true });
  const started = Date.now();
  log.info(`→ ${cmd} starting...`);

  try {
    await fn(args, { env, log });
    log.info(`✔ ${cmd} finished in ${Date.now() - started}ms`);
    return 0;
  } catch (err) {
    log.error({ err }, `✖ ${cmd} failed`);
    printJson(errorResponseFor(err));
    return 1;
  }
}
