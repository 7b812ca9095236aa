/**
 * Source Types
 *
 * What a classified link points at. Descriptors are frozen on creation.
 */

export type Provider = 'spotify' | 'youtube';

export type ContentKind = 'item' | 'collection';

export type SourceVariant = 'track' | 'album' | 'playlist' | 'artist' | 'video';

export interface SourceDescriptor {
  readonly provider: Provider;
  readonly contentKind: ContentKind;
  readonly variant: SourceVariant;
  readonly identifier: string;
  readonly originalLocator: string;
}

const COLLECTION_VARIANTS: ReadonlySet<SourceVariant> = new Set(['album', 'playlist', 'artist']);

export function contentKindOf(variant: SourceVariant): ContentKind {
  return COLLECTION_VARIANTS.has(variant) ? 'collection' : 'item';
}

export function createSourceDescriptor(
  provider: Provider,
  variant: SourceVariant,
  identifier: string,
  originalLocator: string
): SourceDescriptor {
  return Object.freeze({
    provider,
    contentKind: contentKindOf(variant),
    variant,
    identifier,
    originalLocator,
  });
}
