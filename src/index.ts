/**
 * docroot-layers public exports
 */

// Types
export * from './types/errors.ts';
export * from './types/directive.ts';
export * from './types/scope-config.ts';
export * from './types/resolution.ts';
export * from './types/server-config.ts';

// Config
export * from './core/config/merge.ts';
export * from './core/config/context-validator.ts';
export * from './core/config/directives.ts';
export * from './core/config/reader.ts';
export * from './core/config/loader.ts';
export * from './core/config/scope-lookup.ts';

// Layer resolution
export * from './core/layers/path-joiner.ts';
export * from './core/layers/resolver.ts';
export type { FileProber } from './core/layers/file-prober.ts';

// Host adapters
export * from './adapters/fs/stat-prober.ts';
export * from './adapters/host/request.ts';
export * from './adapters/host/pipeline.ts';
export * from './adapters/host/layer-module.ts';
