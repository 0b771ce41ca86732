/**
 * Typed error classes for packing and loading assets.
 */

/** Base class for all asset-system errors. */
export class AssetError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'AssetError';
  }
}

/** The packer root (or every probed asset source) does not exist. */
export class SourceNotFoundError extends AssetError {
  constructor(public readonly source: string) {
    super(`Asset source not found: ${source}`);
    this.name = 'SourceNotFoundError';
  }
}

/** Two source files normalize to the same logical path. */
export class DuplicatePathError extends AssetError {
  constructor(
    public readonly path: string,
    public readonly sources: readonly string[] = [],
  ) {
    super(
      sources.length > 0
        ? `Duplicate logical path "${path}" (from ${sources.map((s) => `"${s}"`).join(' and ')})`
        : `Duplicate logical path "${path}"`,
    );
    this.name = 'DuplicatePathError';
  }
}

/** A filesystem read or write failed. */
export class IoFailureError extends AssetError {
  constructor(
    public readonly path: string,
    cause: unknown,
  ) {
    super(`I/O failure on "${path}": ${describeCause(cause)}`, { cause });
    this.name = 'IoFailureError';
  }
}

/** Archive header, index or entry data failed structural validation. */
export class CorruptArchiveError extends AssetError {
  constructor(
    public readonly reason: string,
    options?: ErrorOptions,
  ) {
    super(`Corrupt archive: ${reason}`, options);
    this.name = 'CorruptArchiveError';
  }
}

/** Archive format version is not the one this loader reads. */
export class UnsupportedVersionError extends AssetError {
  constructor(
    public readonly version: number,
    public readonly supported: number,
  ) {
    super(`Unsupported archive version ${version} (supported: ${supported})`);
    this.name = 'UnsupportedVersionError';
  }
}

/** The active backend has no entry for the requested path. */
export class AssetNotFoundError extends AssetError {
  constructor(public readonly path: string) {
    super(`Asset not found: ${path}`);
    this.name = 'AssetNotFoundError';
  }
}

/**
 * A structurally valid entry failed to decompress to its declared length.
 * Scoped to one entry, so it is also a CorruptArchiveError.
 */
export class AssetCorruptError extends CorruptArchiveError {
  constructor(
    public readonly path: string,
    detail: string,
    options?: ErrorOptions,
  ) {
    super(`entry "${path}" ${detail}`, options);
    this.name = 'AssetCorruptError';
  }
}

/** A logical path escapes its root or is otherwise malformed. */
export class InvalidAssetPathError extends AssetError {
  constructor(
    public readonly path: string,
    public readonly reason: string,
  ) {
    super(`Invalid asset path "${path}": ${reason}`);
    this.name = 'InvalidAssetPathError';
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
