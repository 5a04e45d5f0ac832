export type ContainerErrorCode =
    | 'FORMAT'
    | 'UNSUPPORTED_VERSION'
    | 'INDEX_PARSE'
    | 'NOT_FOUND'
    | 'DUPLICATE_KEY'
    | 'INVALID_KEY'
    | 'COMPRESSION'
    | 'INTEGRITY'
    | 'ARCHIVE'
    | 'SOURCE_NOT_FOUND'
    | 'CONFIG';

export interface ContainerErrorOptions {
    key?: string;
    cause?: unknown;
}

/** Base class of every error raised by the container engine. */
export class ContainerError extends Error {
    readonly code: ContainerErrorCode;
    /** Entry key the error relates to, if any. */
    readonly key?: string;

    constructor(code: ContainerErrorCode, message: string, options?: ContainerErrorOptions) {
        super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
        this.name = new.target.name;
        this.code = code;
        this.key = options?.key;
    }
}

function formatMagic(bytes: Buffer) {
    let printable = bytes.toString('latin1').replace(/[^\x20-\x7e]/g, '.');
    return `"${printable}" (0x${bytes.toString('hex')})`;
}

export class FormatError extends ContainerError {
    constructor(message: string, options?: ContainerErrorOptions) {
        super('FORMAT', message, options);
    }

    static invalidMagic(expected: Buffer, got: Buffer) {
        return new FormatError(`Invalid container magic. Expected: ${formatMagic(expected)} Got: ${formatMagic(got)}`);
    }

    static truncated(what: string, expected: number, got: number) {
        return new FormatError(`Truncated container: ${what} needs ${expected} bytes; Got: ${got} bytes`);
    }
}

export class UnsupportedVersionError extends ContainerError {
    readonly expected: number;
    readonly got: number;

    constructor(expected: number, got: number) {
        super('UNSUPPORTED_VERSION', `Unsupported container format version. Expected: ${expected} Got: ${got}`);
        this.expected = expected;
        this.got = got;
    }
}

export class IndexParseError extends ContainerError {
    constructor(message: string, options?: ContainerErrorOptions) {
        super('INDEX_PARSE', message, options);
    }
}

export class NotFoundError extends ContainerError {
    constructor(key: string) {
        super('NOT_FOUND', `Entry '${key}' not found`, { key });
    }
}

export class DuplicateKeyError extends ContainerError {
    constructor(key: string) {
        super('DUPLICATE_KEY', `Entry '${key}' already exists`, { key });
    }
}

export class InvalidKeyError extends ContainerError {
    constructor(key: string) {
        super('INVALID_KEY', `Entry key '${key}' must be a single path segment`, { key });
    }
}

export class CompressionError extends ContainerError {
    constructor(message: string, options?: ContainerErrorOptions) {
        super('COMPRESSION', message, options);
    }
}

export class IntegrityError extends ContainerError {
    readonly expected: string;
    readonly got: string;

    constructor(key: string, expected: string, got: string, message?: string, cause?: unknown) {
        super('INTEGRITY', message ?? `Checksum mismatch for '${key}'. Expected: ${expected} Got: ${got}`, { key, cause });
        this.expected = expected;
        this.got = got;
    }

    /** The payload no longer decompresses, so its checksum cannot even be computed. */
    static undecodable(key: string, expected: string, cause: unknown) {
        return new IntegrityError(key, expected, '', `Payload of '${key}' is corrupt: ${describeError(cause)}`, cause);
    }
}

export class ArchiveError extends ContainerError {
    constructor(message: string, options?: ContainerErrorOptions) {
        super('ARCHIVE', message, options);
    }
}

export class SourceNotFoundError extends ContainerError {
    readonly sourcePath: string;

    constructor(sourcePath: string, key?: string) {
        super('SOURCE_NOT_FOUND', `Source path '${sourcePath}' not found`, { key });
        this.sourcePath = sourcePath;
    }
}

export class ConfigError extends ContainerError {
    constructor(message: string, options?: ContainerErrorOptions) {
        super('CONFIG', message, options);
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
