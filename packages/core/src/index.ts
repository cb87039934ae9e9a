/**
 * @hookwarden/core - Shared utilities for the hookwarden engine and CLI
 */

export * from './errors.js'
export * from './files.js'
export * from './git.js'
export * from './hooks.js'
export * from './lock.js'
export * from './logger.js'
