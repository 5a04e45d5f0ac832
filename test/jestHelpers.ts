import * as Path from "path";
import * as Fs from "fs";
import { glob } from "glob";
import { Logger } from "../src/logger";

/** File path => contents; a `mode` other than 0o644 can be given with the object form. */
export type TreeSpec = { [path: string]: string | { data: string, mode: number } };

export interface TreeFile {
    data: string;
    mode: number;
}

export function mkdirpSync(dir: string) {
    Fs.mkdirSync(dir, { recursive: true });
}

/** Writes the files of `tree` under `root`, creating directories as needed. */
export function writeTree(root: string, tree: TreeSpec) {
    mkdirpSync(root);

    for (let [path, content] of Object.entries(tree)) {
        let target = Path.join(root, path);
        let file = typeof content === 'string' ? { data: content, mode: 0o644 } : content;

        mkdirpSync(Path.dirname(target));
        Fs.writeFileSync(target, file.data);
        Fs.chmodSync(target, file.mode);
    }

    return root;
}

/** Regular files under `root` with contents and permission bits, keyed by `/`-separated path. */
export async function readTree(root: string): Promise<Map<string, TreeFile>> {
    let matches = await glob('**/*', { cwd: root, nodir: true, dot: true, posix: true });
    let tree = new Map<string, TreeFile>();

    matches.sort().forEach(match => {
        let target = Path.join(root, match);
        tree.set(match, {
            data: Fs.readFileSync(target, 'utf8'),
            mode: Fs.statSync(target).mode & 0o777,
        });
    });

    return tree;
}

export type LogLevel = keyof Logger;

/** Logger that keeps every message for assertions. */
export class RecordingLogger implements Logger {
    readonly messages: { level: LogLevel, message: string }[] = [];

    debug(message: string) { this.messages.push({ level: 'debug', message }); }
    info(message: string) { this.messages.push({ level: 'info', message }); }
    warn(message: string) { this.messages.push({ level: 'warn', message }); }
    error(message: string) { this.messages.push({ level: 'error', message }); }

    get(level: LogLevel) {
        return this.messages.filter(entry => entry.level === level).map(entry => entry.message);
    }
}
