import { afterEach, describe, it, expect, vi } from 'vitest';
import { fetchImageList, jumpTo, saveScribbles } from './editorApi';
import type { EditorView } from '@/validation/api.zod';

const VIEW: EditorView = {
  index: 1,
  filename: 'b.jpg',
  status: 'no-mask',
  total: 3,
  maskCount: 0,
  width: 3,
  height: 2,
  image: 'data:image/png;base64,AAAA',
  overlay: 'data:image/png;base64,AAAA',
  projectPath: '/data',
};

function respondWith(status: number, body: unknown) {
  const fetchMock = vi.fn(
    async () => new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } })
  );
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

describe('editor API client', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts a jump as JSON', async () => {
    const fetchMock = respondWith(200, { view: VIEW, matched: true });

    const result = await jumpTo('b.jpg');

    expect(result).toEqual({ view: VIEW, matched: true });
    expect(fetchMock).toHaveBeenCalledWith('/api/jump', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"name":"b.jpg"}',
    });
  });

  it('unwraps the filename list', async () => {
    respondWith(200, { filenames: ['a.png', 'b.jpg'] });
    expect(await fetchImageList()).toEqual(['a.png', 'b.jpg']);
  });

  it('raises the server error message', async () => {
    respondWith(422, { error: 'Size mismatch: expected 3x2, got 2x2' });
    await expect(saveScribbles(['data:image/png;base64,AAAA'])).rejects.toThrow(
      'Size mismatch: expected 3x2, got 2x2'
    );
  });

  it('falls back to the status line for a non-JSON error page', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(
        async () =>
          new Response('<html>upstream down</html>', {
            status: 502,
            statusText: 'Bad Gateway',
            headers: { 'Content-Type': 'text/html' },
          })
      )
    );

    await expect(jumpTo('a.png')).rejects.toThrow(new Error('502 Bad Gateway'));
  });

  it('rejects a successful response that is not JSON', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('<html></html>', { status: 200 })));

    await expect(fetchImageList()).rejects.toThrow('Unexpected response from /images: not JSON');
  });

  it('rejects a response of the wrong shape', async () => {
    respondWith(200, { view: VIEW });
    await expect(saveScribbles([])).rejects.toThrow(/Unexpected response from \/save/);
  });
});
