import type { z } from 'zod';
import {
  EditorViewZ,
  ErrorResponseZ,
  ImageListZ,
  JumpResponseZ,
  SaveResponseZ,
  type EditorView,
  type JumpResponse,
  type SaveResponse,
} from '@/validation/api.zod';
import { formatValidationIssues } from '@/validation/formatIssues';

const API_BASE_URL = '/api';

async function request<T extends z.ZodTypeAny>(
  schema: T,
  path: string,
  init: { method: 'GET' | 'POST'; body?: unknown } = { method: 'GET' }
): Promise<z.infer<T>> {
  const response = await fetch(`${API_BASE_URL}${path}`, {
    method: init.method,
    headers: init.body === undefined ? undefined : { 'Content-Type': 'application/json' },
    body: init.body === undefined ? undefined : JSON.stringify(init.body),
  });

  const isJson = response.headers.get('Content-Type')?.includes('application/json') ?? false;

  if (!response.ok) {
    const error = isJson ? ErrorResponseZ.safeParse(await response.json()) : null;
    throw new Error(error?.success ? error.data.error : `${response.status} ${response.statusText}`.trim());
  }

  if (!isJson) {
    throw new Error(`Unexpected response from ${path}: not JSON`);
  }

  const json: unknown = await response.json();
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new Error(`Unexpected response from ${path}.\n${formatValidationIssues(parsed.error.issues)}`);
  }
  return parsed.data;
}

export const fetchView = (): Promise<EditorView> => request(EditorViewZ, '/view');

export const fetchImageList = async (): Promise<string[]> =>
  (await request(ImageListZ, '/images')).filenames;

export const goNext = (): Promise<EditorView> => request(EditorViewZ, '/next', { method: 'POST' });

export const goPrevious = (): Promise<EditorView> => request(EditorViewZ, '/previous', { method: 'POST' });

export const jumpTo = (name: string): Promise<JumpResponse> =>
  request(JumpResponseZ, '/jump', { method: 'POST', body: { name } });

/**
 * Save painted layers (PNG data URLs, bottom to top) as the current image's mask
 */
export const saveScribbles = (layers: string[]): Promise<SaveResponse> =>
  request(SaveResponseZ, '/save', { method: 'POST', body: { layers } });
