import { z } from 'zod';
import { LOG_LEVELS } from '../server/logger';

export const DEFAULT_PORT = 7860;

export const EditorConfigZ = z.object({
  datapath: z.string().min(1).default('images'),
  port: z.coerce.number().int().min(0).max(65535).default(DEFAULT_PORT),
  host: z.string().min(1).default('127.0.0.1'),
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

export type EditorConfig = z.infer<typeof EditorConfigZ>;
