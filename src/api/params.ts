import { z } from 'zod';
import { FormatError } from '../lib/errors';
import { MediaKind } from '../types/constants';

const mediaKindSchema = z.enum([MediaKind.DOCS, MediaKind.IMAGES, MediaKind.AUDIO, MediaKind.VIDEO]);

/**
 * Media kind from a route parameter or query string value
 * @throws FormatError for anything but docs, images, audio or video
 */
export function parseMediaKind(value: unknown, fallback?: MediaKind): MediaKind {
  if (value === undefined && fallback !== undefined) return fallback;
  const result = mediaKindSchema.safeParse(value);
  if (!result.success) {
    throw new FormatError(`Unknown media kind: ${String(value)}`);
  }
  return result.data;
}
