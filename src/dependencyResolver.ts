import { PayloadSlice } from './entry';
import { Logger } from './logger';

/** Anything that can look up an entry's dependency list by key. */
export interface DependencySource {
    getMetadata(key: string): PayloadSlice | undefined;
}

export interface Resolution {
    /** Requested keys plus everything reachable from them, in resolution order */
    keys: string[];
    /** Referenced keys absent from the index */
    missing: string[];
}

export interface DependencyNode {
    key: string;
    /** The key is referenced but absent from the index */
    missing: boolean;
    /** The key already appears further up this branch */
    cycle: boolean;
    children: DependencyNode[];
}

/**
 * Breadth-first closure over `dependencies`. Requested keys come first, in
 * the order given. A key without an index entry is reported and skipped.
 * There is no ordering guarantee beyond that: this is not a topological sort.
 */
export function resolveDependencies(source: DependencySource, requested: ReadonlyArray<string>, logger?: Logger): Resolution {
    let resolved = new Set<string>();
    let missing = new Set<string>();
    let queue: string[] = [];

    for (let key of requested) {
        if (!resolved.has(key)) {
            resolved.add(key);
            queue.push(key);
        }
    }

    while (queue.length) {
        let key = queue.shift();

        if (key === undefined)
            break;

        let entry = source.getMetadata(key);

        if (!entry) {
            if (!missing.has(key)) {
                missing.add(key);
                logger?.warn(`Dependency '${key}' not found in container, skipping`);
            }
            continue;
        }

        for (let dependency of entry.dependencies) {
            if (!resolved.has(dependency)) {
                resolved.add(dependency);
                queue.push(dependency);
            }
        }
    }

    return {
        keys: Array.from(resolved).filter(key => !missing.has(key)),
        missing: Array.from(missing),
    };
}

export function buildDependencyTree(source: DependencySource, key: string, ancestors: ReadonlyArray<string> = []): DependencyNode {
    let entry = source.getMetadata(key);
    let node: DependencyNode = { key, missing: !entry, cycle: false, children: [] };

    if (ancestors.includes(key)) {
        node.cycle = true;
        return node;
    }

    if (entry) {
        let path = [...ancestors, key];
        node.children = entry.dependencies.map(dependency => buildDependencyTree(source, dependency, path));
    }

    return node;
}
