/** Width of the `headerSize` and `dataSize` fields. */
export const U64_BYTES = 8 as const;

/** Upper bound of the bounded window a positional read looks through (1 GiB). */
export const MAX_MARSHALLED_SIZE = 1024 * 1024 * 1024;

export const DEFAULT_VERSION = '1.0.0';
export const DEFAULT_MAX_VERSION_LENGTH = 16;
