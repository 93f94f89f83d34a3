import { z } from 'zod';

export const MaskStatusZ = z.enum(['has-mask', 'no-mask']);

const PngDataUrlZ = z
  .string()
  .startsWith('data:image/png;base64,', { message: 'layer must be a PNG data URL' });

export const EditorViewZ = z.object({
  index: z.number().int().nonnegative(),
  filename: z.string(),
  status: MaskStatusZ,
  total: z.number().int().positive(),
  maskCount: z.number().int().nonnegative(),
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  image: PngDataUrlZ,
  overlay: PngDataUrlZ,
  projectPath: z.string(),
});

export const JumpRequestZ = z.object({
  name: z.string(),
});

export const JumpResponseZ = z.object({
  view: EditorViewZ,
  matched: z.boolean(),
});

export const SaveRequestZ = z.object({
  layers: z.array(PngDataUrlZ),
});

export const SaveResponseZ = z.object({
  view: EditorViewZ,
  saved: z.boolean(),
  message: z.string(),
});

export const ImageListZ = z.object({
  filenames: z.array(z.string()),
});

export const ErrorResponseZ = z.object({
  error: z.string(),
});

export type MaskStatus = z.infer<typeof MaskStatusZ>;
export type EditorView = z.infer<typeof EditorViewZ>;
export type JumpRequest = z.infer<typeof JumpRequestZ>;
export type JumpResponse = z.infer<typeof JumpResponseZ>;
export type SaveRequest = z.infer<typeof SaveRequestZ>;
export type SaveResponse = z.infer<typeof SaveResponseZ>;
export type ImageList = z.infer<typeof ImageListZ>;
