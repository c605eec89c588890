/**
 * @entry hindsight library
 *
 * Most agents only need createHindsight(); the lower-level pieces are
 * exported for custom wiring and tooling.
 */

export * from './hindsight/index.js'
export * from './analysis/index.js'
export * from './learning/index.js'
export * from './memory/index.js'
export * from './store/index.js'
export * from './scheduler/index.js'
export * from './backend/index.js'
export * from './config/index.js'
export * from './types/index.js'
export * from './shared/index.js'
