import { z } from 'zod';
import { IndexParseError, describeError } from './errors/containerError';
import { ContainerKind, EntryByKind, FORMAT_VERSION, isValidKey } from './entry';

const manifestFileSchema = z.object({
    path: z.string(),
    size: z.number().int().nonnegative(),
});

const payloadSliceShape = {
    key: z.string().refine(isValidKey, 'expected a single path segment'),
    size: z.number().int().nonnegative(),
    compressedSize: z.number().int().nonnegative(),
    offset: z.number().int().nonnegative(),
    checksum: z.string().regex(/^[0-9a-f]{64}$/, 'expected a SHA-256 hex digest'),
    dependencies: z.array(z.string()),
    description: z.string(),
    files: z.array(manifestFileSchema),
    createdAt: z.string(),
};

const applicationEntrySchema = z.object({
    ...payloadSliceShape,
    kind: z.literal('application'),
    name: z.string(),
    version: z.string(),
});

const binaryEntrySchema = z.object({
    ...payloadSliceShape,
    kind: z.literal('binary'),
    version: z.string(),
    provides: z.array(z.string()),
    envVars: z.record(z.string()),
    architecture: z.string(),
    osType: z.string(),
    executables: z.array(z.string()),
    libraries: z.array(z.string()),
});

const userRecordSchema = z.object({
    ...payloadSliceShape,
    kind: z.literal('userdata'),
    quotaMb: z.number().nullable(),
    updatedAt: z.string(),
    version: z.number().int().positive(),
    fileCount: z.number().int().nonnegative(),
});

const ENTRY_SCHEMAS: { [K in ContainerKind]: z.ZodType<EntryByKind[K], z.ZodTypeDef, unknown> } = {
    application: applicationEntrySchema,
    binary: binaryEntrySchema,
    userdata: userRecordSchema,
};

const indexDocumentSchema = z.object({
    formatVersion: z.number().int(),
    kind: z.enum(['application', 'binary', 'userdata']),
    createdAt: z.string(),
    entryCount: z.number().int().nonnegative(),
    entries: z.record(z.unknown()),
});

export interface IndexDocument<K extends ContainerKind> {
    formatVersion: number;
    kind: K;
    createdAt: string;
    entryCount: number;
    entries: { [key: string]: EntryByKind[K] };
}

/**
 * Entry key => metadata. Lookups are by key; iteration follows insertion
 * order, which is only used for display.
 */
export class EntryIndex<K extends ContainerKind> {
    readonly kind: K;
    private entries = new Map<string, EntryByKind[K]>();

    constructor(kind: K) {
        this.kind = kind;
    }

    get size() {
        return this.entries.size;
    }

    has(key: string) {
        return this.entries.has(key);
    }

    get(key: string): EntryByKind[K] | undefined {
        return this.entries.get(key);
    }

    set(entry: EntryByKind[K]) {
        this.entries.set(entry.key, entry);
    }

    delete(key: string) {
        return this.entries.delete(key);
    }

    keys(): string[] {
        return Array.from(this.entries.keys());
    }

    values(): EntryByKind[K][] {
        return Array.from(this.entries.values());
    }

    toDocument(createdAt: string): IndexDocument<K> {
        let entries: { [key: string]: EntryByKind[K] } = Object.fromEntries(this.entries);

        return {
            formatVersion: FORMAT_VERSION,
            kind: this.kind,
            createdAt: createdAt,
            entryCount: this.entries.size,
            entries: entries,
        };
    }

    serialize(createdAt: string): Buffer {
        return Buffer.from(JSON.stringify(this.toDocument(createdAt), null, 2), 'utf8');
    }

    static parse<K extends ContainerKind>(bytes: Buffer, kind: K): { index: EntryIndex<K>, createdAt: string } {
        let raw: unknown;

        try {
            raw = JSON.parse(bytes.toString('utf8'));
        }
        catch (err) {
            throw new IndexParseError(`Index is not valid JSON: ${describeError(err)}`, { cause: err });
        }

        let document = indexDocumentSchema.safeParse(raw);
        if (!document.success)
            throw new IndexParseError(`Malformed index: ${formatIssues(document.error)}`);

        let { formatVersion, entryCount, entries, createdAt } = document.data;

        if (formatVersion !== FORMAT_VERSION)
            throw new IndexParseError(`Index format version ${formatVersion} does not match header version ${FORMAT_VERSION}`);
        if (document.data.kind !== kind)
            throw new IndexParseError(`Index describes a '${document.data.kind}' container, expected '${kind}'`);

        let index = new EntryIndex(kind);
        let schema = ENTRY_SCHEMAS[kind];

        for (let [key, value] of Object.entries(entries)) {
            let entry = schema.safeParse(value);

            if (!entry.success)
                throw new IndexParseError(`Malformed index entry '${key}': ${formatIssues(entry.error)}`, { key });
            if (entry.data.key !== key)
                throw new IndexParseError(`Index entry '${key}' carries mismatched key '${entry.data.key}'`, { key });

            index.set(entry.data);
        }

        if (index.size !== entryCount)
            throw new IndexParseError(`Index declares ${entryCount} entries but contains ${index.size}`);

        return { index, createdAt };
    }
}

function formatIssues(error: z.ZodError) {
    return error.issues
        .map(issue => issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message)
        .join('; ');
}
