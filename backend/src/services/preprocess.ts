import sharp from 'sharp';
import { InputError } from '../errors.js';
import { INPUT_SIZE, type ImageFormat, type InputShape, type PreprocessedImage } from '../types/contracts.js';

const SUPPORTED_FORMATS: ReadonlySet<string> = new Set<ImageFormat>(['jpeg', 'png', 'webp', 'gif']);
const INPUT_SHAPE: InputShape = [1, INPUT_SIZE, INPUT_SIZE, 3];

function isSupportedFormat(format: string | undefined): format is ImageFormat {
  return format !== undefined && SUPPORTED_FORMATS.has(format);
}

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Decodes an uploaded image and turns it into the model input: RGB,
 * stretched to 224x224 without cropping, every value scaled to [0, 1].
 */
export async function preprocessImage(buffer: Buffer): Promise<PreprocessedImage> {
  if (buffer.length === 0) {
    throw new InputError('the uploaded file is empty');
  }

  let format: string | undefined;
  try {
    ({ format } = await sharp(buffer).metadata());
  } catch (error) {
    throw new InputError(reasonOf(error));
  }

  if (!isSupportedFormat(format)) {
    throw new InputError(`unsupported image format "${format ?? 'unknown'}"`);
  }

  let pixels: Buffer;
  let channels: number;
  try {
    const { data, info } = await sharp(buffer)
      .resize(INPUT_SIZE, INPUT_SIZE, { fit: 'fill' })
      .removeAlpha()
      .toColourspace('srgb')
      .raw()
      .toBuffer({ resolveWithObject: true });
    pixels = data;
    channels = info.channels;
  } catch (error) {
    throw new InputError(reasonOf(error));
  }

  const pixelCount = INPUT_SIZE * INPUT_SIZE;
  if ((channels !== 1 && channels !== 3) || pixels.length !== pixelCount * channels) {
    throw new InputError(`unexpected decoded layout (${channels} channels)`);
  }

  const data = new Float32Array(pixelCount * 3);
  for (let i = 0; i < pixelCount; i += 1) {
    for (let c = 0; c < 3; c += 1) {
      // single-band greyscale is spread over all three channels
      data[i * 3 + c] = pixels[channels === 3 ? i * 3 + c : i] / 255;
    }
  }

  return { shape: INPUT_SHAPE, data, format };
}
