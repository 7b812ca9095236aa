/**
 * Delivery Decision
 *
 * Direct send only for exactly one file, at or under the size limit, from
 * a single-item source. Everything else is archived and uploaded.
 */

import { TrackdropError, type SourceDescriptor } from '@trackdrop/core';
import type { ListedFile } from '@trackdrop/utils';

export const MIB = 1024 * 1024;
export const DEFAULT_DIRECT_SEND_LIMIT_BYTES = 50 * MIB;

export type ArchiveReason = 'collection' | 'multiple-files' | 'size';

export type DeliveryDecision =
  | { kind: 'direct'; file: ListedFile }
  | { kind: 'archive'; files: ListedFile[]; reason: ArchiveReason };

export function decideDelivery(
  files: ReadonlyArray<ListedFile>,
  source: SourceDescriptor,
  directSendLimitBytes: number = DEFAULT_DIRECT_SEND_LIMIT_BYTES
): DeliveryDecision {
  const [first] = files;
  if (!first) {
    throw new TrackdropError('Nothing to deliver', 'NO_OUTPUT', { source });
  }

  if (source.contentKind === 'collection') {
    return { kind: 'archive', files: [...files], reason: 'collection' };
  }
  if (files.length > 1) {
    return { kind: 'archive', files: [...files], reason: 'multiple-files' };
  }
  if (first.size > directSendLimitBytes) {
    return { kind: 'archive', files: [first], reason: 'size' };
  }
  return { kind: 'direct', file: first };
}
