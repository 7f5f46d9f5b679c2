/**
 * devshell: evaluator for reproducible development-shell descriptors.
 * Library exports barrel file.
 */

// Sources
export * from './core/sources/registry.js';
export * from './core/sources/locator.js';

// Packages and overlays
export * from './core/packages/types.js';
export * from './core/packages/attr-path.js';
export * from './core/overlays/applicator.js';

// Platforms, environments and outputs
export * from './core/platforms/selector.js';
export * from './core/environment/projector.js';
export * from './core/outputs/aggregator.js';

// Resolution
export * from './core/resolver/types.js';
export * from './core/resolver/resolve.js';
export * from './core/resolver/catalog-schema.js';
export * from './core/resolver/catalog-resolver.js';

// Descriptor and evaluation
export * from './core/descriptor/schema.js';
export * from './core/descriptor/loader.js';
export * from './core/evaluation/evaluator.js';

// Configuration
export * from './core/config/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
