import { Jimp } from 'jimp';
import { decode as decodeJpeg } from 'jpeg-js';
import type { RgbImage, RgbaImage } from '../lib/canvas/types';
import { toRgba } from '../lib/canvas/imageUtils';
import { DecodeError } from '../lib/errors';

const PNG_DATA_URL_PREFIX = 'data:image/png;base64,';

// PNG IHDR color type for truecolor without alpha
const PNG_COLOR_TYPE_RGB = 2;

function isJpeg(bytes: Buffer): boolean {
  return bytes.length >= 3 && bytes[0] === 0xff && bytes[1] === 0xd8 && bytes[2] === 0xff;
}

/**
 * JPEGs are decoded as stored: an EXIF orientation tag does not rotate the
 * pixel grid, so masks line up with the file as other tools read it.
 */
function decodeJpegAsStored(bytes: Buffer): RgbaImage {
  const { width, height, data } = decodeJpeg(bytes, { useTArray: true, formatAsRGBA: true });
  return { width, height, channels: 4, data: new Uint8ClampedArray(data) };
}

/**
 * Decode PNG, JPEG or BMP bytes into an RGBA buffer.
 *
 * @param source - Shown in the error when decoding fails (a path or a label)
 */
export async function decodeImage(bytes: Buffer, source: string): Promise<RgbaImage> {
  if (isJpeg(bytes)) {
    try {
      return decodeJpegAsStored(bytes);
    } catch (error) {
      throw new DecodeError(source, { cause: error });
    }
  }

  let image: Awaited<ReturnType<typeof Jimp.read>>;
  try {
    image = await Jimp.read(bytes);
  } catch (error) {
    throw new DecodeError(source, { cause: error });
  }

  const { width, height, data } = image.bitmap;
  return { width, height, channels: 4, data: new Uint8ClampedArray(data) };
}

/**
 * Encode a 3- or 4-channel buffer as PNG. 3-channel buffers are written
 * without an alpha channel.
 */
export async function encodePng(image: RgbImage | RgbaImage): Promise<Buffer> {
  const rgba = image.channels === 4 ? image : toRgba(image);
  const bitmap = {
    width: rgba.width,
    height: rgba.height,
    data: Buffer.from(rgba.data.buffer, rgba.data.byteOffset, rgba.data.byteLength),
  };
  const png = Jimp.fromBitmap(bitmap);
  if (image.channels === 3) {
    return png.getBuffer('image/png', { colorType: PNG_COLOR_TYPE_RGB });
  }
  return png.getBuffer('image/png');
}

export async function toPngDataUrl(image: RgbImage | RgbaImage): Promise<string> {
  const png = await encodePng(image);
  return `${PNG_DATA_URL_PREFIX}${png.toString('base64')}`;
}

export function isPngDataUrl(value: string): boolean {
  return value.startsWith(PNG_DATA_URL_PREFIX);
}

/**
 * Decode a `data:image/png;base64,...` URL as sent by canvas.toDataURL()
 */
export async function decodePngDataUrl(dataUrl: string, source: string): Promise<RgbaImage> {
  if (!isPngDataUrl(dataUrl)) {
    throw new DecodeError(source);
  }
  return decodeImage(Buffer.from(dataUrl.slice(PNG_DATA_URL_PREFIX.length), 'base64'), source);
}
