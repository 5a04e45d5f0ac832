import * as Fs from 'fs';
import * as Path from 'path';
import { glob } from 'glob';
import { ManifestFile } from './entry';

const BIN_DIRS = ['bin', 'sbin', 'usr/bin', 'usr/sbin'];

export interface BinaryLayout {
    executables: string[];
    libraries: string[];
}

/** Regular files under the source root with their sizes, sorted by path. */
export async function collectManifest(sourcePath: string): Promise<ManifestFile[]> {
    let stats = await Fs.promises.stat(sourcePath);

    if (stats.isFile())
        return [{ path: Path.basename(sourcePath), size: stats.size }];

    let matches = await glob('**/*', { cwd: sourcePath, nodir: true, dot: true, posix: true });
    matches.sort();

    let manifest: ManifestFile[] = [];
    for (let match of matches) {
        let fileStats = await Fs.promises.lstat(Path.join(sourcePath, match));

        if (fileStats.isFile())
            manifest.push({ path: match, size: fileStats.size });
    }

    return manifest;
}

export function isLibraryName(fileName: string) {
    return fileName.endsWith('.so') || fileName.includes('.so.');
}

/** Executables (any execute bit set) and shared libraries in a binary package. */
export async function detectBinaryLayout(sourcePath: string, manifest: ReadonlyArray<ManifestFile>): Promise<BinaryLayout> {
    let layout: BinaryLayout = { executables: [], libraries: [] };
    let root = (await Fs.promises.stat(sourcePath)).isFile() ? Path.dirname(sourcePath) : sourcePath;

    for (let file of manifest) {
        let fileName = Path.posix.basename(file.path);
        let stats = await Fs.promises.stat(Path.join(root, file.path));

        if (isLibraryName(fileName))
            layout.libraries.push(file.path);
        else if (stats.mode & 0o111)
            layout.executables.push(file.path);
    }

    return layout;
}

/** Names of the executables found directly inside the usual bin directories. */
export async function detectProvides(sourcePath: string): Promise<string[]> {
    let provides: string[] = [];

    for (let binDir of BIN_DIRS) {
        if (!Fs.existsSync(Path.join(sourcePath, binDir)))
            continue;

        let matches = await glob('*', { cwd: Path.join(sourcePath, binDir), nodir: true, posix: true });
        matches.sort();

        for (let match of matches) {
            let stats = await Fs.promises.stat(Path.join(sourcePath, binDir, match));

            if (stats.mode & 0o111 && !provides.includes(match))
                provides.push(match);
        }
    }

    return provides;
}
