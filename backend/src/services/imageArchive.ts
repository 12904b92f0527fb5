import type { SupabaseClient } from '@supabase/supabase-js';
import type { ImageFormat } from '../types/contracts.js';

const CONTENT_TYPES: Record<ImageFormat, string> = {
  jpeg: 'image/jpeg',
  png: 'image/png',
  webp: 'image/webp',
  gif: 'image/gif'
};

export interface ImageArchive {
  store(predictionId: string, buffer: Buffer, format: ImageFormat): Promise<string>;
}

export function archivePath(predictionId: string, format: ImageFormat): string {
  return `predictions/${predictionId}.${format === 'jpeg' ? 'jpg' : format}`;
}

/** Keeps the uploaded photo in a Supabase Storage bucket, one object per prediction. */
export class SupabaseImageArchive implements ImageArchive {
  constructor(
    private readonly client: SupabaseClient,
    private readonly bucket: string
  ) {}

  async store(predictionId: string, buffer: Buffer, format: ImageFormat): Promise<string> {
    const path = archivePath(predictionId, format);
    const { error } = await this.client.storage
      .from(this.bucket)
      .upload(path, buffer, { contentType: CONTENT_TYPES[format] });

    if (error) {
      throw new Error(`Storage upload failed: ${error.message}`);
    }

    return path;
  }
}
