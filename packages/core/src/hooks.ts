/**
 * Shared utilities for agent hooks: payload parsing, exit codes, config loading
 */

import { existsSync, readFileSync } from 'fs'
import { join } from 'path'
import { z } from 'zod'

import { describeError, InputError } from './errors.js'
import { createLogger } from './logger.js'

const logger = createLogger('hooks')

const toolInputSchema = z.object({
	command: z.string().optional(),
	file_path: z.string().optional(),
	notebook_path: z.string().optional(),
	content: z.string().optional(),
	new_string: z.string().optional(),
	new_source: z.string().optional(),
	edits: z.array(z.object({ new_string: z.string().optional() }).passthrough()).optional()
}).passthrough()

const rawHookInputSchema = toolInputSchema.extend({
	tool_name: z.string().min(1).optional(),
	tool: z.string().min(1).optional(),
	tool_input: toolInputSchema.optional(),
	toolInput: toolInputSchema.optional(),
	parameters: toolInputSchema.optional(),
	cwd: z.string().optional(),
	session_id: z.string().optional(),
	hook_event_name: z.string().optional()
}).passthrough()

export type ToolInput = z.infer<typeof toolInputSchema>

/**
 * PreToolUse hook input structure, after alias normalization
 */
export interface PreToolInput {
	tool_name: string;
	tool_input: ToolInput;
	cwd?: string;
	session_id?: string;
	hook_event_name?: string;
}

/**
 * Parse and validate a hook payload.
 *
 * Accepts `tool` for `tool_name`, and `toolInput` or `parameters` for
 * `tool_input`, since hosts have used all three spellings. A flat payload
 * (`{"tool": "bash", "command": "ls"}`) carries its tool input at the top level.
 */
export function parseHookInput(raw: string): PreToolInput {
	if (!raw.trim()) {
		throw new InputError('no input data provided')
	}

	let json: unknown
	try {
		json = JSON.parse(raw)
	} catch (error) {
		throw new InputError(`invalid JSON input: ${ describeError(error) }`, { cause: error })
	}

	const parsed = rawHookInputSchema.safeParse(json)
	if (!parsed.success) {
		const issue = parsed.error.issues[0]
		const where = issue.path.length > 0 ? issue.path.join('.') : 'input'
		throw new InputError(`invalid hook payload at ${ where }: ${ issue.message }`)
	}

	const data = parsed.data
	const toolName = data.tool_name ?? data.tool
	if (!toolName) {
		throw new InputError('missing required field: tool_name')
	}

	const { command, file_path, notebook_path, content, new_string, new_source, edits } = data

	return {
		tool_name: toolName,
		tool_input: data.tool_input ?? data.toolInput ?? data.parameters ??
			{ command, file_path, notebook_path, content, new_string, new_source, edits },
		cwd: data.cwd,
		session_id: data.session_id,
		hook_event_name: data.hook_event_name
	}
}

/**
 * Read all of stdin as UTF-8
 */
export function readStdin(): string {
	try {
		return readFileSync(0, 'utf-8')
	} catch (error) {
		throw new InputError(`failed to read stdin: ${ describeError(error) }`, { cause: error })
	}
}

/**
 * Exit codes for hooks. ERROR means the check itself failed, not that the
 * action is blocked; the host does not treat it as a block.
 */
export const EXIT = {
	ALLOW: 0,
	ERROR: 1,
	BLOCK: 2
} as const

export type ExitCode = typeof EXIT[keyof typeof EXIT]

/**
 * Load JSON config with defaults.
 *
 * The first `configName` found under `searchPaths` is validated with `schema`
 * and merged over `defaults`. An unreadable or invalid file is logged and
 * skipped.
 */
export function loadConfig<T extends object>(
	configName: string,
	defaults: T,
	schema: z.ZodType<Partial<T>, z.ZodTypeDef, unknown>,
	searchPaths: string[] = [ process.cwd(), join(process.cwd(), '..') ]
): T {
	for (const basePath of searchPaths) {
		const configPath = join(basePath, configName)
		if (!existsSync(configPath)) {continue}

		let content: unknown
		try {
			content = JSON.parse(readFileSync(configPath, 'utf-8'))
		} catch (error) {
			logger.warn({ configPath, err: describeError(error) }, 'ignoring unreadable config')
			continue
		}

		const parsed = schema.safeParse(content)
		if (!parsed.success) {
			logger.warn({ configPath, issues: parsed.error.issues }, 'ignoring invalid config')
			continue
		}

		logger.debug({ configPath }, 'loaded config')
		return { ...defaults, ...parsed.data }
	}
	return defaults
}

/**
 * camelCase key to the SNAKE_CASE suffix of its environment variable
 */
export function envKeyFor(prefix: string, key: string): string {
	return `${ prefix }_${ key.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toUpperCase() }`
}

/**
 * Load config from environment variables with prefix.
 *
 * Only scalar keys (string, number, boolean) can be set this way; the value is
 * coerced to the type of the current value.
 */
export function loadEnvConfig<T extends object>(
	prefix: string,
	defaults: T,
	env: NodeJS.ProcessEnv = process.env
): T {
	const overrides: Record<string, unknown> = {}

	for (const [ key, current ] of Object.entries(defaults)) {
		const envKey = envKeyFor(prefix, key)
		const envValue = env[envKey]
		if (envValue === undefined) {continue}

		if (typeof current === 'number') {
			const value = Number(envValue)
			if (Number.isFinite(value)) {
				overrides[key] = value
			} else {
				logger.warn({ envKey, envValue }, 'ignoring non-numeric environment override')
			}
		} else if (typeof current === 'boolean') {
			overrides[key] = envValue === 'true'
		} else if (typeof current === 'string' || current === undefined) {
			overrides[key] = envValue
		}
	}

	return { ...defaults, ...overrides }
}
