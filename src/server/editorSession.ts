import type { Layer, RgbImage } from '../lib/canvas/types';
import { DEFAULT_OVERLAY_ALPHA } from '../lib/canvas/constants';
import { flattenLayers } from '../lib/canvas/maskFlattening';
import { blendOverlay } from '../lib/canvas/overlay';
import { navigate, type NavigationAction } from '../lib/canvas/navigation';
import type { EditorView, JumpResponse, SaveResponse } from '../validation/api.zod';
import type { DataLayout } from './config';
import { ImageStore } from './imageStore';
import { MaskStore } from './maskStore';
import { toPngDataUrl } from './imageCodec';
import { createLogger, type Logger } from './logger';

export const NOTHING_TO_SAVE_MESSAGE = 'No scribbles to save.';

export interface EditorSessionOptions {
  layout: DataLayout;
  logger?: Logger;
  /** Blend factor for the overlay preview (default: 0.7) */
  overlayAlpha?: number;
}

/**
 * EditorSession - the action handlers behind the editor UI
 *
 * Holds the navigation cursor over the sorted image list. Every action
 * re-reads the image and its mask from disk and answers with a fresh
 * EditorView. Actions run one at a time; the cursor only moves once the
 * view for the new position has been built.
 */
export class EditorSession {
  private cursor = 0;
  private queue: Promise<void> = Promise.resolve();

  private constructor(
    private readonly images: ImageStore,
    private readonly masks: MaskStore,
    readonly filenames: readonly string[],
    private readonly projectPath: string,
    private readonly log: Logger,
    private readonly overlayAlpha: number
  ) {}

  /**
   * Open a data root. Creates the mask directory and fails with
   * EmptyCollectionError when there is nothing to annotate.
   */
  static async create(options: EditorSessionOptions): Promise<EditorSession> {
    const { layout, logger = createLogger('off'), overlayAlpha = DEFAULT_OVERLAY_ALPHA } = options;

    const images = new ImageStore(layout.imageDir);
    const masks = new MaskStore(layout.maskDir);

    await masks.ensureDirectory();
    const filenames = await images.list();

    logger.info(`Found ${filenames.length} images in ${layout.imageDir}`);

    return new EditorSession(images, masks, filenames, layout.root, logger, overlayAlpha);
  }

  get total(): number {
    return this.filenames.length;
  }

  get currentIndex(): number {
    return this.cursor;
  }

  get currentName(): string {
    return this.filenames[this.cursor];
  }

  current(): Promise<EditorView> {
    return this.exclusive(() => this.buildView(this.cursor));
  }

  async next(): Promise<EditorView> {
    return (await this.move({ type: 'NEXT' })).view;
  }

  async previous(): Promise<EditorView> {
    return (await this.move({ type: 'PREVIOUS' })).view;
  }

  /**
   * Jump to an image by filename. An unknown name reloads the current
   * image and reports `matched: false`.
   */
  jumpTo(name: string): Promise<JumpResponse> {
    return this.move({ type: 'JUMP_TO', name });
  }

  /**
   * Flatten the painted layers into a mask for the current image and write
   * it. With no layers nothing is written and any existing mask is kept.
   */
  save(layers: Layer[]): Promise<SaveResponse> {
    return this.exclusive(async () => {
      const filename = this.currentName;
      const image = await this.images.load(filename);
      const result = flattenLayers(layers, image.width, image.height);

      if (result.kind === 'empty') {
        this.log.debug(`Nothing to save for ${filename}`);
        const existing = await this.masks.load(filename);
        return {
          saved: false,
          message: NOTHING_TO_SAVE_MESSAGE,
          view: await this.renderView(this.cursor, image, existing),
        };
      }

      const maskPath = await this.masks.save(filename, result.mask);
      this.log.info(`Saved scribbles for ${filename} (${layers.length} layers) to ${maskPath}`);

      return {
        saved: true,
        message: `Scribbles saved to: ${maskPath}`,
        view: await this.renderView(this.cursor, image, result.mask),
      };
    });
  }

  private move(action: NavigationAction): Promise<JumpResponse> {
    return this.exclusive(async () => {
      const outcome = navigate(this.cursor, this.filenames, action);
      const view = await this.buildView(outcome.cursor);

      if (!outcome.matched && action.type === 'JUMP_TO') {
        this.log.warn(`Image not found: ${action.name}`);
      }
      this.log.debug(`${action.type}: ${this.cursor} -> ${outcome.cursor} (${view.filename})`);

      this.cursor = outcome.cursor;
      return { view, matched: outcome.matched };
    });
  }

  private async buildView(cursor: number): Promise<EditorView> {
    const filename = this.filenames[cursor];
    const image = await this.images.load(filename);
    const mask = await this.masks.load(filename);
    return this.renderView(cursor, image, mask);
  }

  private async renderView(cursor: number, image: RgbImage, mask: RgbImage | null): Promise<EditorView> {
    const overlay = blendOverlay(image, mask, this.overlayAlpha);

    return {
      index: cursor,
      filename: this.filenames[cursor],
      status: mask ? 'has-mask' : 'no-mask',
      total: this.total,
      maskCount: await this.masks.count(),
      width: image.width,
      height: image.height,
      image: await toPngDataUrl(image),
      overlay: await toPngDataUrl(overlay),
      projectPath: this.projectPath,
    };
  }

  /**
   * Run actions one after another. Failures reach the caller through the
   * returned promise; the queue itself keeps going.
   */
  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
