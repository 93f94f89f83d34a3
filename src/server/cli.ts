import { describeError } from '../lib/errors';
import { parseConfig, USAGE } from './config';
import { createLogger } from './logger';
import { startEditorServer } from './server';

async function main(argv: string[]): Promise<number> {
  let parsed: ReturnType<typeof parseConfig>;
  try {
    parsed = parseConfig(argv);
  } catch (error) {
    console.error(describeError(error));
    console.error(USAGE);
    return 1;
  }

  if (parsed.help) {
    console.log(USAGE);
    return 0;
  }

  const log = createLogger(parsed.config.logLevel);
  try {
    await startEditorServer(parsed.config, log);
  } catch (error) {
    log.error(describeError(error));
    return 1;
  }
  return 0;
}

main(process.argv.slice(2)).then(
  (code) => {
    if (code !== 0) process.exit(code);
  },
  (error: unknown) => {
    console.error(error);
    process.exit(1);
  }
);
