/**
 * Choice Callback Codec
 *
 * Button payloads are decoded once at the boundary into a tagged variant.
 * Wire format: `<tag>|<value>|<userId>`, kept under Telegram's 64-byte limit.
 *
 *   mt|audio|42    select media type
 *   aq|flac|42     select audio quality
 *   vq|720|42      select video quality
 */

import { z } from 'zod';
import { InvalidCallbackError } from './errors/index.js';
import type { AudioQuality, MediaType } from './types/job.js';

export type ChoiceCallback =
  | { type: 'SelectMediaType'; userId: number; mediaType: MediaType }
  | { type: 'SelectAudioQuality'; userId: number; quality: AudioQuality }
  | { type: 'SelectVideoQuality'; userId: number; height: number };

const userIdSchema = z.coerce.number().int().positive();

const callbackSchema = z.discriminatedUnion('tag', [
  z.object({
    tag: z.literal('mt'),
    value: z.enum(['audio', 'video']),
    userId: userIdSchema,
  }),
  z.object({
    tag: z.literal('aq'),
    value: z.enum(['mp3', 'flac']),
    userId: userIdSchema,
  }),
  z.object({
    tag: z.literal('vq'),
    value: z.coerce.number().int().min(1).max(10000),
    userId: userIdSchema,
  }),
]);

/**
 * Decode a raw payload. Throws InvalidCallbackError for anything malformed.
 */
export function decodeCallback(payload: string): ChoiceCallback {
  const parts = payload.split('|');
  if (parts.length !== 3) {
    throw new InvalidCallbackError(payload, 'expected three segments');
  }

  const [tag, value, userId] = parts;
  const parsed = callbackSchema.safeParse({ tag, value, userId });
  if (!parsed.success) {
    throw new InvalidCallbackError(payload, parsed.error.issues.map(i => i.message).join('; '));
  }

  const data = parsed.data;
  switch (data.tag) {
    case 'mt':
      return { type: 'SelectMediaType', userId: data.userId, mediaType: data.value };
    case 'aq':
      return { type: 'SelectAudioQuality', userId: data.userId, quality: data.value };
    case 'vq':
      return { type: 'SelectVideoQuality', userId: data.userId, height: data.value };
  }
}

export function encodeCallback(callback: ChoiceCallback): string {
  switch (callback.type) {
    case 'SelectMediaType':
      return `mt|${callback.mediaType}|${callback.userId}`;
    case 'SelectAudioQuality':
      return `aq|${callback.quality}|${callback.userId}`;
    case 'SelectVideoQuality':
      return `vq|${callback.height}|${callback.userId}`;
  }
}
