import { fileURLToPath } from 'node:url';
import { createServer, type LogLevel as ViteLogLevel, type ViteDevServer } from 'vite';
import type { EditorConfig } from '../validation/config.zod';
import { resolveDataLayout } from './config';
import { EditorSession } from './editorSession';
import { editorApiPlugin } from './editorApi';
import type { LogLevel, Logger } from './logger';

const PROJECT_ROOT = fileURLToPath(new URL('../../', import.meta.url));
const VITE_CONFIG = fileURLToPath(new URL('../../vite.config.ts', import.meta.url));

const viteLogLevels: Record<LogLevel, ViteLogLevel> = {
  off: 'silent',
  error: 'error',
  warn: 'warn',
  info: 'warn',
  debug: 'info',
};

export interface RunningEditor {
  session: EditorSession;
  server: ViteDevServer;
  url: string;
}

/**
 * Open the data root and serve the editor UI with its API
 */
export async function startEditorServer(config: EditorConfig, log: Logger): Promise<RunningEditor> {
  const layout = resolveDataLayout(config.datapath);
  const session = await EditorSession.create({ layout, logger: log });

  const server = await createServer({
    configFile: VITE_CONFIG,
    root: PROJECT_ROOT,
    logLevel: viteLogLevels[config.logLevel],
    plugins: [editorApiPlugin(session, log)],
    server: {
      host: config.host,
      port: config.port,
      strictPort: true,
    },
  });

  await server.listen();

  const url = `http://${config.host}:${config.port}/`;
  log.info(`Project: ${layout.root}`);
  log.info(`Editor running at ${url}`);

  return { session, server, url };
}
