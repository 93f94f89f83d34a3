import path from 'node:path';
import { readFile, readdir, stat, writeFile } from 'node:fs/promises';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { EditorSession, NOTHING_TO_SAVE_MESSAGE } from './editorSession';
import { resolveDataLayout, type DataLayout } from './config';
import { decodePngDataUrl } from './imageCodec';
import { createLayer } from '../lib/canvas/layerUtils';
import { createRgbaImage, getPixelColor } from '../lib/canvas/imageUtils';
import { DecodeError, DimensionMismatchError, EmptyCollectionError } from '../lib/errors';
import { makeTempDir, removeTempDir, solidImage, strokeImage, writeJpeg, writePng } from './testHelpers';

const WHITE = { r: 255, g: 255, b: 255 };
const BLACK = { r: 0, g: 0, b: 0 };

describe('EditorSession', () => {
  let root: string;
  let layout: DataLayout;

  beforeEach(async () => {
    root = await makeTempDir();
    layout = resolveDataLayout(root);
    await writePng(layout.imageDir, 'a.png', solidImage(2, 2, { r: 255, g: 0, b: 0 }));
    await writeJpeg(layout.imageDir, 'b.jpg', solidImage(3, 2, { r: 128, g: 128, b: 128 }));
    await writePng(layout.imageDir, 'c.png', solidImage(2, 2, { r: 0, g: 0, b: 255 }));
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  const open = () => EditorSession.create({ layout, overlayAlpha: 0.5 });

  describe('create', () => {
    it('creates the mask directory', async () => {
      await open();
      expect((await stat(layout.maskDir)).isDirectory()).toBe(true);
    });

    it('fails when there are no images', async () => {
      const empty = resolveDataLayout(path.join(root, 'empty'));
      await expect(EditorSession.create({ layout: empty })).rejects.toThrow(EmptyCollectionError);
    });

    it('starts on the first image with no masks', async () => {
      const session = await open();
      const view = await session.current();

      expect(session.filenames).toEqual(['a.png', 'b.jpg', 'c.png']);
      expect(view).toMatchObject({
        index: 0,
        filename: 'a.png',
        status: 'no-mask',
        total: 3,
        maskCount: 0,
        width: 2,
        height: 2,
        projectPath: root,
      });
      expect(view.image.startsWith('data:image/png;base64,')).toBe(true);
    });
  });

  describe('navigation', () => {
    it('shows every image without a mask before anything is saved', async () => {
      const session = await open();
      const statuses = [(await session.current()).status, (await session.next()).status, (await session.next()).status];
      expect(statuses).toEqual(['no-mask', 'no-mask', 'no-mask']);
    });

    it('stops at both ends of the collection', async () => {
      const session = await open();

      expect((await session.previous()).index).toBe(0);
      await session.next();
      await session.next();
      expect((await session.next()).filename).toBe('c.png');
      expect(session.currentIndex).toBe(2);
    });

    it('jumps to an image by filename', async () => {
      const session = await open();

      const { view, matched } = await session.jumpTo('b.jpg');

      expect(matched).toBe(true);
      expect(view).toMatchObject({ index: 1, filename: 'b.jpg', width: 3, height: 2 });
      expect(session.currentName).toBe('b.jpg');
    });

    it('stays on the current image for an unknown filename', async () => {
      const session = await open();
      await session.jumpTo('c.png');

      const { view, matched } = await session.jumpTo('missing.png');

      expect(matched).toBe(false);
      expect(view.index).toBe(2);
      expect(session.currentIndex).toBe(2);
    });

    it('does not move when the target image cannot be read', async () => {
      await writeFile(path.join(layout.imageDir, 'b.jpg'), 'not a jpeg');
      const session = await open();

      await expect(session.next()).rejects.toThrow(DecodeError);
      expect(session.currentIndex).toBe(0);

      expect((await session.jumpTo('c.png')).view.index).toBe(2);
    });

    it('handles overlapping actions in call order', async () => {
      const session = await open();
      const views = await Promise.all([session.next(), session.next(), session.next()]);
      expect(views.map((v) => v.index)).toEqual([1, 2, 2]);
    });
  });

  describe('save', () => {
    it('writes the flattened mask next to the images', async () => {
      const session = await open();
      const stroke = createLayer(strokeImage(2, 2, WHITE, [[0, 0]]), 'Stroke 1');

      const result = await session.save([stroke]);

      const maskPath = path.join(layout.maskDir, 'a.png');
      expect(result.saved).toBe(true);
      expect(result.message).toBe(`Scribbles saved to: ${maskPath}`);
      expect(result.view).toMatchObject({ index: 0, status: 'has-mask', maskCount: 1 });
      expect((await stat(maskPath)).isFile()).toBe(true);
    });

    it('previews the saved mask over the image', async () => {
      const session = await open();
      const stroke = createLayer(strokeImage(2, 2, WHITE, [[0, 0]]), 'Stroke 1');

      const { view } = await session.save([stroke]);
      const overlay = await decodePngDataUrl(view.overlay, 'overlay');

      expect(getPixelColor(overlay, 0, 0)).toEqual({ r: 255, g: 128, b: 128, a: 255 });
      expect(getPixelColor(overlay, 1, 0)).toEqual({ r: 192, g: 64, b: 64, a: 255 });
    });

    it('shows the mask again after navigating away and back', async () => {
      const session = await open();
      await session.save([createLayer(strokeImage(2, 2, BLACK, [[1, 1]]), 'Stroke 1')]);

      expect((await session.next()).status).toBe('no-mask');
      const back = await session.previous();
      expect(back).toMatchObject({ filename: 'a.png', status: 'has-mask', maskCount: 1 });
    });

    it('names the mask after the image base name', async () => {
      const session = await open();
      await session.jumpTo('b.jpg');

      const result = await session.save([createLayer(strokeImage(3, 2, WHITE, [[2, 1]]), 'Stroke 1')]);

      expect(result.message).toBe(`Scribbles saved to: ${path.join(layout.maskDir, 'b.png')}`);
    });

    it('writes nothing when there are no strokes', async () => {
      const session = await open();

      const result = await session.save([]);

      expect(result.saved).toBe(false);
      expect(result.message).toBe(NOTHING_TO_SAVE_MESSAGE);
      expect(result.view).toMatchObject({ status: 'no-mask', maskCount: 0 });
      expect(await readdir(layout.maskDir)).toEqual([]);
    });

    it('keeps an existing mask when saving no strokes', async () => {
      const session = await open();
      await session.save([createLayer(strokeImage(2, 2, WHITE, [[0, 0]]), 'Stroke 1')]);
      const maskPath = path.join(layout.maskDir, 'a.png');
      const before = await readFile(maskPath);

      const result = await session.save([]);

      expect(result.saved).toBe(false);
      expect(result.view.status).toBe('has-mask');
      expect((await readFile(maskPath)).equals(before)).toBe(true);
    });

    it('rejects strokes of the wrong size and writes nothing', async () => {
      const session = await open();

      await expect(session.save([createLayer(createRgbaImage(3, 3), 'Stroke 1')])).rejects.toThrow(
        DimensionMismatchError
      );
      expect(await readdir(layout.maskDir)).toEqual([]);
    });
  });
});
