/**
 * Guard configuration: defaults, file schema, environment overrides
 */

import { loadConfig, loadEnvConfig, resolveProjectRoot } from '@hookwarden/core'
import { homedir } from 'os'
import { isAbsolute, join, resolve } from 'path'
import { z } from 'zod'

import type { GuardConfig } from './types.js'

export const CONFIG_FILE = 'hookwarden.json'
export const ENV_PREFIX = 'HOOKWARDEN'

/** Directory under the project root holding the override store and audit log */
export const STATE_DIR = join('.claude', 'hookwarden')

export const DEFAULT_CONFIG: GuardConfig = {
	allowedPaths: [],
	installEntryPoint: 'safe_install.sh',
	protectedFiles: [ 'run_tests.sh', '.pre-commit-config.yaml', 'CLAUDE.md' ],
	disabledGuards: [],
	overrideStore: join(STATE_DIR, 'overrides.db'),
	auditLog: join(STATE_DIR, 'audit.jsonl'),
	overrideTtlMinutes: 60,
	lockTimeoutMs: 2000,
	staleLockMs: 10_000
}

const positiveInt = z.number().int().positive()

export const configSchema = z.object({
	projectRoot: z.string().min(1).optional(),
	allowedPaths: z.array(z.string().min(1)).optional(),
	installEntryPoint: z.string().min(1).optional(),
	protectedFiles: z.array(z.string().min(1)).optional(),
	disabledGuards: z.array(z.string()).optional(),
	overrideStore: z.string().min(1).optional(),
	auditLog: z.string().min(1).optional(),
	overrideTtlMinutes: positiveInt.optional(),
	lockTimeoutMs: positiveInt.optional(),
	staleLockMs: positiveInt.optional()
})

/** Config with every path made absolute */
export interface ResolvedConfig extends GuardConfig {
	projectRoot: string;
}

function absolute(root: string, path: string): string {
	if (path === '~' || path.startsWith('~/')) {
		return join(homedir(), path.slice(1))
	}
	return isAbsolute(path) ? resolve(path) : resolve(root, path)
}

/**
 * Resolve relative paths against the project root
 */
export function resolveConfig(config: GuardConfig, cwd: string): ResolvedConfig {
	const projectRoot = config.projectRoot
		? absolute(cwd, config.projectRoot)
		: resolveProjectRoot(cwd)

	return {
		...config,
		projectRoot,
		allowedPaths: config.allowedPaths.map(p => absolute(projectRoot, p)),
		overrideStore: absolute(projectRoot, config.overrideStore),
		auditLog: absolute(projectRoot, config.auditLog)
	}
}

/**
 * Load `.claude/hookwarden.json` (or `hookwarden.json`) from the project
 * root, then apply `HOOKWARDEN_*` environment overrides.
 */
export function loadGuardConfig(cwd: string, env: NodeJS.ProcessEnv = process.env): ResolvedConfig {
	const root = resolveProjectRoot(cwd, env[`${ ENV_PREFIX }_PROJECT_ROOT`])

	const fromFile = loadConfig<GuardConfig>(
		CONFIG_FILE,
		DEFAULT_CONFIG,
		configSchema,
		[ join(root, '.claude'), root ]
	)
	const merged = loadEnvConfig(ENV_PREFIX, { projectRoot: root, ...fromFile }, env)

	return resolveConfig(merged, root)
}
