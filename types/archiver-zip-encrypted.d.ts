declare module 'archiver-zip-encrypted' {
  /** Format module passed to archiver.registerFormat */
  const zipEncrypted: (options?: unknown) => unknown;
  export = zipEncrypted;
}
