/**
 * @trackdrop/packaging
 *
 * Delivery decision, package naming, password generation and
 * AES-encrypted ZIP creation.
 */

export {
  decideDelivery,
  DEFAULT_DIRECT_SEND_LIMIT_BYTES,
  MIB,
  type DeliveryDecision,
  type ArchiveReason,
} from './decision.js';

export {
  resolvePackageName,
  fallbackPackageName,
  archiveFileName,
  archiveEntryNames,
  ARCHIVE_NAME_MAX_LENGTH,
  type NamingInput,
} from './naming.js';

export { generateArchivePassword } from './password.js';

export {
  createEncryptedArchive,
  type ArchiveSource,
  type ArchiveResult,
  type ArchiveProgress,
} from './archive.js';

export {
  Packager,
  type PackagerOptions,
  type PackageRequest,
  type PackageResult,
} from './packager.js';
