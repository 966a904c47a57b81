import type { IdentifierPosition, Uri } from '../types/index.js';

interface UriRecord {
    readonly url: string;
    readonly labels: Set<string>;
    parent: number | null;
    readonly children: number[];
}

/**
 * Interned identifier records. Hierarchy links are indices into the arena,
 * so cyclic source data is representable; traversals keep a visited set.
 */
export class UriArena {
    private readonly records: UriRecord[] = [];
    private readonly byUrl = new Map<string, number>();

    /**
     * Independent copy; engines extend a clone so earlier results stay intact.
     */
    clone(): UriArena {
        const copy = new UriArena();
        for (const record of this.records) {
            copy.byUrl.set(record.url, copy.records.length);
            copy.records.push({
                url: record.url,
                labels: new Set(record.labels),
                parent: record.parent,
                children: [...record.children],
            });
        }
        return copy;
    }

    get size(): number {
        return this.records.length;
    }

    /**
     * Index of the record for `url`, created on first sight.
     * A given label is added to the record.
     */
    intern(url: string, label?: string): number {
        let index = this.byUrl.get(url);
        if (index === undefined) {
            index = this.records.length;
            this.records.push({ url, labels: new Set(), parent: null, children: [] });
            this.byUrl.set(url, index);
        }
        if (label) {
            this.record(index).labels.add(label);
        }
        return index;
    }

    indexOf(url: string): number | undefined {
        return this.byUrl.get(url);
    }

    /**
     * Record `child` as narrower than `parent`. The first parent set wins;
     * later ones only add the child link.
     */
    link(parent: number, child: number): void {
        const parentRecord = this.record(parent);
        const childRecord = this.record(child);
        if (!parentRecord.children.includes(child)) {
            parentRecord.children.push(child);
        }
        if (childRecord.parent === null && parent !== child) {
            childRecord.parent = parent;
        }
    }

    get(index: number): Readonly<{ url: string; labels: readonly string[]; parent: number | null; children: readonly number[] }> {
        const record = this.record(index);
        return {
            url: record.url,
            labels: [...record.labels].sort(),
            parent: record.parent,
            children: [...record.children],
        };
    }

    /**
     * Parent chain of `index`, nearest first. Stops when a record repeats.
     */
    ancestors(index: number): number[] {
        const result: number[] = [];
        const visited = new Set<number>([index]);
        let current = this.record(index).parent;
        while (current !== null && !visited.has(current)) {
            visited.add(current);
            result.push(current);
            current = this.record(current).parent;
        }
        return result;
    }

    /**
     * All records reachable through child links, breadth first.
     */
    descendants(index: number): number[] {
        const result: number[] = [];
        const visited = new Set<number>([index]);
        const queue = [...this.record(index).children];
        while (queue.length > 0) {
            const next = queue.shift();
            if (next === undefined || visited.has(next)) continue;
            visited.add(next);
            result.push(next);
            queue.push(...this.record(next).children);
        }
        return result;
    }

    /**
     * Snapshot of a record as an identifier.
     */
    toUri(index: number, positionInTriple: IdentifierPosition, isSafe: boolean): Uri {
        const record = this.get(index);
        return {
            url: record.url,
            positionInTriple,
            isSafe,
            labels: record.labels,
            parent: record.parent,
            children: record.children,
        };
    }

    private record(index: number): UriRecord {
        const record = this.records[index];
        if (!record) {
            throw new RangeError(`No identifier at index ${index}`);
        }
        return record;
    }
}
