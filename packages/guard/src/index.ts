/**
 * @hookwarden/guard - Guard pipeline, override codes and audit log
 */

export * from './aggregator.js'
export * from './audit.js'
export * from './config.js'
export * from './guards/index.js'
export * from './intercept.js'
export * from './override.js'
export * from './parser.js'
export * from './patterns.js'
export * from './registry.js'
export * from './types.js'
