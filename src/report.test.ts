import { BuildSummary } from './containerWriter';
import { UserRecord } from './entry';
import { NotFoundError } from './errors/containerError';
import * as Report from './report';

const RECORD: UserRecord = {
    kind: 'userdata',
    key: 'alice',
    description: '',
    size: 2048,
    compressedSize: 512,
    offset: 0,
    checksum: 'f'.repeat(64),
    dependencies: [],
    files: [{ path: 'notes.txt', size: 11 }],
    fileCount: 1,
    quotaMb: null,
    createdAt: '2024-01-02T03:04:05.000Z',
    updatedAt: '2024-01-03T03:04:05.000Z',
    version: 3,
};

test('ratios are size over compressed size', () => {
    expect(Report.formatRatio(10, 4)).toBe('2.50x');
    expect(Report.formatRatio(10, 0)).toBe('0.00x');
});

test('build summaries report sizes and orphaned bytes', () => {
    let summary: BuildSummary = {
        path: 'users.blob',
        kind: 'userdata',
        totalSize: 4096,
        indexSize: 1000,
        dataSize: 3082,
        orphanedBytes: 1200,
        entries: [],
    };

    expect(Report.renderBuildSummary(summary)).toBe([
        'Container: users.blob (userdata)',
        'Total size: 4,096 bytes',
        'Index size: 1,000 bytes',
        'Data size: 3,082 bytes',
        'Orphaned: 1,200 bytes (run compact to reclaim)',
    ].join('\n'));
});

test('entry details list one field per line', () => {
    let lines = Report.renderEntryInfo(RECORD).split('\n').map(line => line.trimEnd());
    let row = (label: string, value: string) => ' ' + label.padEnd(13) + '  ' + value;

    expect(lines).toEqual([
        row('Key:', 'alice'),
        row('Version:', '3'),
        row('Quota:', 'unlimited'),
        row('Updated:', '2024-01-03T03:04:05.000Z'),
        row('Created:', '2024-01-02T03:04:05.000Z'),
        row('Size:', '2,048 bytes'),
        row('Compressed:', '512 bytes (4.00x)'),
        row('Offset:', '0'),
        row('Checksum:', 'f'.repeat(64)),
        row('Dependencies:', '-'),
        row('Files:', '1'),
    ]);
});

test('entry lists show versions per kind', () => {
    let table = Report.renderEntryList([RECORD]);

    expect(table.split('\n')[3]).toBe('│ alice │ v3      │ 2,048 │        512 │     1 │ -            │');
    expect(Report.renderEntryList([])).toBe('No entries');
});

test('dependency trees are indented with markers', () => {
    let tree = {
        key: 'a', missing: false, cycle: false, children: [
            { key: 'b', missing: false, cycle: false, children: [{ key: 'a', missing: false, cycle: true, children: [] }] },
            { key: 'ghost', missing: true, cycle: false, children: [] },
        ],
    };

    expect(Report.renderDependencyTree(tree)).toBe([
        'a',
        '  └─ b',
        '    └─ a (cycle)',
        '  └─ ghost (missing)',
    ].join('\n'));
});

test('extraction and verification reports list each key', () => {
    let extraction = Report.renderExtractionReport({
        results: new Map([['a', true], ['b', false]]),
        errors: new Map([['b', new NotFoundError('b')]]),
        missing: ['ghost'],
        success: false,
    });

    expect(extraction).toBe([
        '  ✓ a',
        "  ✗ b: Entry 'b' not found",
        '  ! ghost: dependency not found in container',
        'Extracted 1/2 entries',
    ].join('\n'));

    let verification = Report.renderVerificationReport({
        results: new Map([['a', true]]),
        errors: new Map(),
        success: true,
    });

    expect(verification).toBe('  ✓ a\nAll entries verified');
});
