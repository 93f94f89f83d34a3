import type { RGB } from './types';

// Mask flattening
export const MASK_BACKGROUND: RGB = { r: 128, g: 128, b: 128 };
export const MASK_IGNORED: RGB = { r: 0, g: 0, b: 0 };
export const MASK_MARKED: RGB = { r: 255, g: 255, b: 255 };

// Overlay preview
export const DEFAULT_OVERLAY_ALPHA = 0.7;

// Brush palette is fixed: black strokes are ignored by the mask rule,
// everything else counts as a mark.
export const BRUSH_COLORS = ['#000000', '#CCCCCC'] as const;
export const DEFAULT_BRUSH_SIZE = 20;
export const MIN_BRUSH_SIZE = 1;
export const MAX_BRUSH_SIZE = 120;

// Files
export const SUPPORTED_IMAGE_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.bmp'] as const;
export const MASK_EXTENSION = '.png';
export const IMAGES_DIRNAME = 'images';
export const MASKS_DIRNAME = 'alpha';

// Preview panes
export const EDITOR_HEIGHT = 868;
