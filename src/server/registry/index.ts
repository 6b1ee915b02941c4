/**
 * Scope registry and syntax indexing.
 */

export { ScopeRegistry, buildSnapshot, reachableSyntaxes } from './scope-registry';
export type { RegistrySnapshot, QueryOptions } from './scope-registry';
export { indexSyntaxFile, splitScopes, parseSublimeReference, parseTextMateInclude } from './syntax-indexer';
export {
    discoverPackages,
    findSyntaxFiles,
    readSyntaxFiles,
    loadPackage,
    resourcePathFor,
    isSyntaxFileName,
} from './package-loader';
export type { PackageLocation, LoadResult } from './package-loader';
