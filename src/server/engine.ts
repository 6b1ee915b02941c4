/**
 * Engine facade: completion, diagnostics and package change handling behind
 * one object the language server (or any other host) drives.
 */

import { Dialect } from '../parser';
import { DEFAULT_SETTINGS } from './constants';
import { toError } from './errors';
import { getCompletions } from './handlers/completion';
import { validateDocument } from './handlers/validation';
import { silentLogger } from './logger';
import { PackageLocation, ScopeRegistry, discoverPackages, loadPackage, readSyntaxFiles } from './registry';
import { CompletionCandidate, Finding, Logger, PackageChangeEvent, Settings, SyntaxFile } from './types';

export class SyntaxDevEngine {
    readonly registry: ScopeRegistry;
    private settings: Settings;

    constructor(private readonly logger: Logger = silentLogger, settings: Settings = DEFAULT_SETTINGS) {
        this.registry = new ScopeRegistry(logger);
        this.settings = settings;
    }

    getCompletions(text: string, offset: number, dialect: Dialect): CompletionCandidate[] {
        return getCompletions(text, offset, dialect, {
            registry: this.registry,
            logger: this.logger,
            maxCompletionItems: this.settings.maxCompletionItems,
        });
    }

    getDiagnostics(text: string, dialect: Dialect): Finding[] {
        return validateDocument(text, dialect, {
            registry: this.registry,
            logger: this.logger,
            settings: this.settings.validation,
        });
    }

    /**
     * Re-index (or drop) a package. Changes apply in arrival order; queries
     * keep reading the previous snapshot until a change is complete.
     */
    onPackageChanged(event: PackageChangeEvent): Promise<void> {
        return this.registry.enqueue(async () => {
            if (event.kind === 'removed') {
                this.registry.invalidate(event.packageId);
                return;
            }
            const files = await this.filesOf(event);
            this.registry.replacePackage(event.packageId, files);
        });
    }

    /**
     * Index every package below the given packages directories. Packages an
     * earlier scan found that are no longer there are dropped. Returns the
     * number of packages loaded.
     */
    loadPackages(roots: readonly string[] = this.settings.packagesPaths): Promise<number> {
        return this.registry.enqueue(async () => {
            const found = new Map<string, SyntaxFile[]>();
            for (const root of roots) {
                let locations: PackageLocation[];
                try {
                    locations = await discoverPackages(root);
                } catch (error) {
                    this.logger.warn(`Cannot read packages directory ${root}: ${toError(error).message}`);
                    continue;
                }
                for (const location of locations) {
                    try {
                        const result = await loadPackage(location);
                        result.failures.forEach(failure => this.logger.warn(failure.chain));
                        found.set(location.packageId, result.files);
                    } catch (error) {
                        this.logger.warn(`Cannot read package ${location.packageId}: ${toError(error).message}`);
                    }
                }
            }
            this.registry.replaceScannedPackages(found);
            this.logger.info(`Loaded ${found.size} packages, ${this.registry.size} scopes`);
            return found.size;
        });
    }

    updateSettings(settings: Settings): void {
        this.settings = settings;
    }

    getSettings(): Settings {
        return this.settings;
    }

    /** Resolves once every queued package change has been applied */
    whenIdle(): Promise<void> {
        return this.registry.whenIdle();
    }

    private async filesOf(event: PackageChangeEvent): Promise<SyntaxFile[]> {
        const supplied: SyntaxFile[] = [];
        const paths: string[] = [];
        for (const file of event.syntaxFiles) {
            if (typeof file === 'string') paths.push(file);
            else supplied.push(file);
        }
        if (paths.length === 0) return supplied;

        const result = await readSyntaxFiles(event.packageId, event.packagePath, paths);
        result.failures.forEach(failure => this.logger.warn(failure.chain));
        return [...supplied, ...result.files];
    }
}
