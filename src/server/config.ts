import path from 'node:path';
import { parseArgs } from 'node:util';
import { IMAGES_DIRNAME, MASKS_DIRNAME } from '../lib/canvas/constants';
import { ConfigError, describeError } from '../lib/errors';
import { EditorConfigZ, type EditorConfig } from '../validation/config.zod';
import { formatValidationIssues } from '../validation/formatIssues';

export const USAGE = `Usage: scribble-mask-editor [options]

Options:
  --datapath <dir>    Root directory containing an 'images/' subfolder (default: images)
  --port <n>          Port for the editor UI (default: 7860)
  --host <host>       Interface to listen on (default: 127.0.0.1)
  --log-level <level> off | error | warn | info | debug (default: info)
  --help              Show this message`;

export type ParsedArgs = { help: true } | { help: false; config: EditorConfig };

/**
 * Parse and validate command line options (without the node/script prefix)
 */
export function parseConfig(argv: string[]): ParsedArgs {
  let values: {
    datapath?: string;
    port?: string;
    host?: string;
    'log-level'?: string;
    help?: boolean;
  };

  try {
    ({ values } = parseArgs({
      args: argv,
      options: {
        datapath: { type: 'string' },
        port: { type: 'string' },
        host: { type: 'string' },
        'log-level': { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
      strict: true,
      allowPositionals: false,
    }));
  } catch (error) {
    throw new ConfigError(describeError(error));
  }

  if (values.help) {
    return { help: true };
  }

  const parsed = EditorConfigZ.safeParse({
    datapath: values.datapath,
    port: values.port,
    host: values.host,
    logLevel: values['log-level'],
  });

  if (!parsed.success) {
    throw new ConfigError(`Invalid options.\n${formatValidationIssues(parsed.error.issues)}`);
  }

  return { help: false, config: parsed.data };
}

export interface DataLayout {
  root: string;
  imageDir: string;
  maskDir: string;
}

export function resolveDataLayout(datapath: string): DataLayout {
  const root = path.resolve(datapath);
  return {
    root,
    imageDir: path.join(root, IMAGES_DIRNAME),
    maskDir: path.join(root, MASKS_DIRNAME),
  };
}
