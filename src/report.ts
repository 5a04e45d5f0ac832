import { compressionRatio, formatBytes } from './bufferUtils';
import { ExtractionReport, VerificationReport } from './containerReader';
import { BuildSummary } from './containerWriter';
import { DependencyNode } from './dependencyResolver';
import { ContainerEntry } from './entry';
import { describeError } from './errors/containerError';
import { HorizontalAlignment, TableFormatter } from './utils';

const { Left, Right } = HorizontalAlignment;

export function formatRatio(size: number, compressedSize: number) {
    return `${compressionRatio(size, compressedSize).toFixed(2)}x`;
}

export function renderBuildSummary(summary: BuildSummary) {
    let table = new TableFormatter({
        header: ['Key', 'Size', 'Compressed', 'Ratio', 'Dependencies'],
        hAlignments: [Left, Right, Right, Right, Left],
    });

    summary.entries.forEach(entry => table.push(
        entry.key,
        formatBytes(entry.size),
        formatBytes(entry.compressedSize),
        formatRatio(entry.size, entry.compressedSize),
        entry.dependencies.join(', ') || '-',
    ));

    let lines = [
        `Container: ${summary.path} (${summary.kind})`,
        `Total size: ${formatBytes(summary.totalSize)} bytes`,
        `Index size: ${formatBytes(summary.indexSize)} bytes`,
        `Data size: ${formatBytes(summary.dataSize)} bytes`,
    ];

    if (summary.orphanedBytes)
        lines.push(`Orphaned: ${formatBytes(summary.orphanedBytes)} bytes (run compact to reclaim)`);

    if (table.rowCount)
        lines.push('', table.get());

    return lines.join('\n');
}

function versionOf(entry: ContainerEntry) {
    return entry.kind === 'userdata' ? `v${entry.version}` : entry.version;
}

export function renderEntryList(entries: ReadonlyArray<ContainerEntry>) {
    if (!entries.length)
        return 'No entries';

    let table = new TableFormatter({
        header: ['Key', 'Version', 'Size', 'Compressed', 'Files', 'Dependencies'],
        hAlignments: [Left, Left, Right, Right, Right, Left],
    });

    entries.forEach(entry => table.push(
        entry.key,
        versionOf(entry),
        formatBytes(entry.size),
        formatBytes(entry.compressedSize),
        entry.files.length,
        entry.dependencies.join(', ') || '-',
    ));

    return table.get();
}

export function renderEntryInfo(entry: ContainerEntry) {
    let table = new TableFormatter({ boxBorders: null });

    table.push('Key:', entry.key);

    switch (entry.kind) {
        case 'application':
            table.push('Name:', entry.name);
            table.push('Version:', entry.version);
            break;
        case 'binary':
            table.push('Version:', entry.version);
            table.push('Platform:', `${entry.osType}/${entry.architecture}`);
            table.push('Provides:', entry.provides.join(', ') || '-');
            table.push('Executables:', entry.executables.join(', ') || '-');
            table.push('Libraries:', entry.libraries.join(', ') || '-');
            Object.entries(entry.envVars).forEach(([name, value]) => table.push('Env:', `${name}=${value}`));
            break;
        case 'userdata':
            table.push('Version:', entry.version);
            table.push('Quota:', entry.quotaMb === null ? 'unlimited' : `${entry.quotaMb} MB`);
            table.push('Updated:', entry.updatedAt);
            break;
    }

    if (entry.description)
        table.push('Description:', entry.description);

    table.push('Created:', entry.createdAt);
    table.push('Size:', `${formatBytes(entry.size)} bytes`);
    table.push('Compressed:', `${formatBytes(entry.compressedSize)} bytes (${formatRatio(entry.size, entry.compressedSize)})`);
    table.push('Offset:', entry.offset);
    table.push('Checksum:', entry.checksum);
    table.push('Dependencies:', entry.dependencies.join(', ') || '-');
    table.push('Files:', entry.files.length);

    return table.get();
}

export function renderDependencyTree(node: DependencyNode, indent = 0): string {
    let marker = node.missing ? ' (missing)' : node.cycle ? ' (cycle)' : '';
    let line = `${'  '.repeat(indent)}${indent ? '└─ ' : ''}${node.key}${marker}`;

    return [line, ...node.children.map(child => renderDependencyTree(child, indent + 1))].join('\n');
}

function renderOutcomes(results: Map<string, boolean>, errors: Map<string, Error>) {
    let lines: string[] = [];

    results.forEach((ok, key) => {
        let error = errors.get(key);
        lines.push(ok ? `  ✓ ${key}` : `  ✗ ${key}: ${error ? describeError(error) : 'failed'}`);
    });

    return lines;
}

export function renderExtractionReport(report: ExtractionReport) {
    let succeeded = Array.from(report.results.values()).filter(ok => ok).length;
    let lines = renderOutcomes(report.results, report.errors);

    report.missing.forEach(key => lines.push(`  ! ${key}: dependency not found in container`));
    lines.push(`Extracted ${succeeded}/${report.results.size} entries`);

    return lines.join('\n');
}

export function renderVerificationReport(report: VerificationReport) {
    let lines = renderOutcomes(report.results, report.errors);
    lines.push(report.success ? 'All entries verified' : `${report.errors.size} of ${report.results.size} entries failed verification`);
    return lines.join('\n');
}
