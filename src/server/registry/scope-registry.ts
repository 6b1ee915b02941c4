/**
 * Scope registry: every scope name declared by the installed syntaxes.
 *
 * The registry holds an immutable snapshot. Package changes build a new
 * snapshot and swap it in with a single assignment, so a query always reads
 * a complete one. Changes are applied one at a time through `enqueue`.
 */

import { EmbedCycleError, IndexingError, toError } from '../errors';
import { silentLogger } from '../logger';
import { Logger, ScopeEntry, SyntaxFile, SyntaxRecord, SyntaxReference } from '../types';
import { indexSyntaxFile } from './syntax-indexer';

export interface RegistrySnapshot {
    /** Sorted by name, then source */
    readonly entries: readonly ScopeEntry[];
    /** Sorted by resource path */
    readonly records: readonly SyntaxRecord[];
    /** Every scope name and every dotted prefix of one */
    readonly knownScopes: ReadonlySet<string>;
}

export interface QueryOptions {
    includeInternal?: boolean;
}

const EMPTY_SNAPSHOT: RegistrySnapshot = {
    entries: [],
    records: [],
    knownScopes: new Set(),
};

type ReferenceResolver = (reference: SyntaxReference) => SyntaxRecord | undefined;

/**
 * Syntaxes reachable from `root` through references, `root` first.
 * Uses an explicit stack; a reference back into the current chain is a
 * cycle, reported and not followed.
 */
export function reachableSyntaxes(
    root: SyntaxRecord,
    resolveReference: ReferenceResolver,
    onCycle: (cycle: string[]) => void
): SyntaxRecord[] {
    const order: SyntaxRecord[] = [root];
    const visited = new Set<string>([root.resourcePath]);
    const onChain = new Set<string>([root.resourcePath]);
    const stack: { record: SyntaxRecord; next: number }[] = [{ record: root, next: 0 }];

    while (stack.length > 0) {
        const frame = stack[stack.length - 1];
        if (frame.next >= frame.record.references.length) {
            stack.pop();
            onChain.delete(frame.record.resourcePath);
            continue;
        }

        const target = resolveReference(frame.record.references[frame.next++]);
        // Self references (`scope:<own base>#ctx`) are ordinary
        if (!target || target === frame.record) continue;

        if (onChain.has(target.resourcePath)) {
            const start = stack.findIndex(f => f.record === target);
            onCycle([...stack.slice(start).map(f => f.record.resourcePath), target.resourcePath]);
            continue;
        }
        if (visited.has(target.resourcePath)) continue;

        visited.add(target.resourcePath);
        onChain.add(target.resourcePath);
        order.push(target);
        stack.push({ record: target, next: 0 });
    }

    return order;
}

function createResolver(records: readonly SyntaxRecord[]): ReferenceResolver {
    const byPath = new Map<string, SyntaxRecord>();
    const byScope = new Map<string, SyntaxRecord>();
    for (const record of records) {
        byPath.set(record.resourcePath, record);
        if (record.baseScope && !byScope.has(record.baseScope)) {
            byScope.set(record.baseScope, record);
        }
    }
    return reference => reference.kind === 'scope' ? byScope.get(reference.scope) : byPath.get(reference.path);
}

function compareEntries(a: ScopeEntry, b: ScopeEntry): number {
    if (a.name !== b.name) return a.name < b.name ? -1 : 1;
    if (a.source !== b.source) return a.source < b.source ? -1 : 1;
    return 0;
}

/**
 * Build a snapshot from indexed records.
 *
 * A scope of a hidden syntax is internal unless a visible syntax reaches
 * that syntax through its references (embedding it, for example).
 */
export function buildSnapshot(records: readonly SyntaxRecord[], logger: Logger = silentLogger): RegistrySnapshot {
    const sorted = [...records].sort((a, b) => (a.resourcePath < b.resourcePath ? -1 : a.resourcePath > b.resourcePath ? 1 : 0));
    const resolveReference = createResolver(sorted);

    const reportedCycles = new Set<string>();
    const onCycle = (cycle: string[]) => {
        const key = [...new Set(cycle)].sort().join('\n');
        if (reportedCycles.has(key)) return;
        reportedCycles.add(key);
        logger.warn(new EmbedCycleError(cycle).message);
    };

    const reachedFromVisible = new Set<string>();
    for (const root of sorted) {
        const reached = reachableSyntaxes(root, resolveReference, onCycle);
        if (root.hidden) continue;
        reached.forEach(record => reachedFromVisible.add(record.resourcePath));
    }

    const entries: ScopeEntry[] = [];
    const knownScopes = new Set<string>();
    for (const record of sorted) {
        const internal = record.hidden && !reachedFromVisible.has(record.resourcePath);
        for (const name of record.ownScopes) {
            entries.push({ name, source: record.resourcePath, packageId: record.packageId, internal });
            const parts = name.split('.');
            for (let i = 1; i <= parts.length; i++) {
                knownScopes.add(parts.slice(0, i).join('.'));
            }
        }
    }
    entries.sort(compareEntries);

    return { entries, records: sorted, knownScopes };
}

export class ScopeRegistry {
    private snapshot: RegistrySnapshot = EMPTY_SNAPSHOT;
    private packages = new Map<string, readonly SyntaxRecord[]>();
    private pending: Promise<void> = Promise.resolve();
    /** Packages that came from the last directory scan */
    private scanned = new Set<string>();

    constructor(private readonly logger: Logger = silentLogger) {}

    /**
     * Entries a syntax file contributes, including the scopes of the syntaxes
     * it references, resolved against the current snapshot. Does not change
     * the registry.
     */
    index(file: SyntaxFile): ScopeEntry[] {
        const record = this.tryIndex(file);
        if (!record) return [];

        const others = this.snapshot.records.filter(r => r.resourcePath !== record.resourcePath);
        const resolveReference = createResolver([record, ...others]);
        const reached = reachableSyntaxes(record, resolveReference, cycle => {
            this.logger.warn(new EmbedCycleError(cycle).message);
        });

        const entries: ScopeEntry[] = [];
        for (const syntax of reached) {
            const internal = record.hidden && syntax.hidden;
            for (const name of syntax.ownScopes) {
                entries.push({ name, source: syntax.resourcePath, packageId: syntax.packageId, internal });
            }
        }
        return entries.sort(compareEntries);
    }

    /**
     * Scopes matching `word`, case-sensitively: prefix matches first, then
     * substring matches, each group in alphabetical order.
     */
    query(word: string, options: QueryOptions = {}): ScopeEntry[] {
        const { entries } = this.snapshot;
        const prefixMatches: ScopeEntry[] = [];
        const substringMatches: ScopeEntry[] = [];
        for (const entry of entries) {
            if (entry.internal && !options.includeInternal) continue;
            if (entry.name.startsWith(word)) {
                prefixMatches.push(entry);
            } else if (entry.name.includes(word)) {
                substringMatches.push(entry);
            }
        }
        return [...prefixMatches, ...substringMatches];
    }

    /**
     * Replace everything a package contributes. Files that fail to index are
     * logged and skipped; a file listed twice counts once, the last one kept.
     */
    replacePackage(packageId: string, files: readonly SyntaxFile[]): void {
        const records = this.indexPackage(files);
        const packages = new Map(this.packages);
        packages.set(packageId, records);
        this.swap(packages);
        this.logger.info(`Indexed ${records.length} of ${files.length} syntax files in ${packageId}`);
    }

    /**
     * Replace the result of a packages directory scan in one swap. Packages
     * an earlier scan found that this one did not are dropped; packages
     * added through change events are kept.
     */
    replaceScannedPackages(found: ReadonlyMap<string, readonly SyntaxFile[]>): void {
        const packages = new Map(this.packages);
        for (const packageId of this.scanned) {
            if (!found.has(packageId)) packages.delete(packageId);
        }
        for (const [packageId, files] of found) {
            packages.set(packageId, this.indexPackage(files));
        }
        this.scanned = new Set(found.keys());
        this.swap(packages);
    }

    /** Drop every entry of a package */
    invalidate(packageId: string): void {
        this.scanned.delete(packageId);
        if (!this.packages.has(packageId)) return;
        const packages = new Map(this.packages);
        packages.delete(packageId);
        this.swap(packages);
        this.logger.info(`Removed package ${packageId}`);
    }

    /**
     * Run a registry change after every change queued before it. A failed
     * change is logged and does not stop later ones.
     */
    enqueue<T>(task: () => Promise<T>): Promise<T> {
        const run = this.pending.then(task);
        this.pending = run.then(
            () => undefined,
            (error: unknown) => this.logger.error(`Registry update failed: ${toError(error).message}`)
        );
        return run;
    }

    /** Resolves once every queued change has been applied */
    whenIdle(): Promise<void> {
        return this.pending;
    }

    /** Exact scope or a dotted prefix of one, internal scopes included */
    hasScope(scope: string): boolean {
        return this.snapshot.knownScopes.has(scope);
    }

    /** Base scopes of the visible syntaxes */
    baseScopes(): string[] {
        const scopes = new Set<string>();
        for (const record of this.snapshot.records) {
            if (record.baseScope && !record.hidden) scopes.add(record.baseScope);
        }
        return [...scopes].sort();
    }

    /** Resource paths of the visible syntaxes */
    syntaxPaths(): string[] {
        return this.snapshot.records.filter(r => !r.hidden).map(r => r.resourcePath);
    }

    hasSyntax(resourcePath: string): boolean {
        return this.snapshot.records.some(r => r.resourcePath === resourcePath);
    }

    isEmpty(): boolean {
        return this.snapshot.entries.length === 0;
    }

    get size(): number {
        return this.snapshot.entries.length;
    }

    current(): RegistrySnapshot {
        return this.snapshot;
    }

    private swap(packages: Map<string, readonly SyntaxRecord[]>): void {
        const records = [...packages.values()].flat();
        const next = buildSnapshot(records, this.logger);
        this.packages = packages;
        this.snapshot = next;
    }

    private indexPackage(files: readonly SyntaxFile[]): SyntaxRecord[] {
        const byPath = new Map<string, SyntaxRecord>();
        for (const file of files) {
            const record = this.tryIndex(file);
            if (record) byPath.set(record.resourcePath, record);
        }
        return [...byPath.values()];
    }

    private tryIndex(file: SyntaxFile): SyntaxRecord | null {
        try {
            return indexSyntaxFile(file);
        } catch (error) {
            const failure = error instanceof IndexingError
                ? error
                : new IndexingError(file.resourcePath, toError(error).message, toError(error));
            this.logger.warn(failure.message);
            return null;
        }
    }
}
