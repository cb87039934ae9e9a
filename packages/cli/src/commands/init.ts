/**
 * hookwarden init - register the hook and write a starter config
 *
 * Usage: hookwarden init [--force]
 */

import { findGitRoot } from '@hookwarden/core'
import { CONFIG_FILE, DEFAULT_CONFIG, STATE_DIR } from '@hookwarden/guard'
import { appendFileSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs'
import { join } from 'path'
import { z } from 'zod'

import type { CliContext } from '../context.js'

const HOOK_COMMAND = 'hookwarden pre'
const HOOK_MATCHER = 'Bash|Write|Edit|MultiEdit|NotebookEdit'

const hookEntrySchema = z.object({
	matcher: z.string().optional(),
	hooks: z.array(z.object({
		type: z.string(),
		command: z.string().optional()
	}).passthrough()).optional()
}).passthrough()

const settingsSchema = z.object({
	hooks: z.record(z.array(hookEntrySchema)).optional()
}).passthrough()

type ClaudeSettings = z.infer<typeof settingsSchema>

const STARTER_CONFIG = {
	allowedPaths: DEFAULT_CONFIG.allowedPaths,
	installEntryPoint: DEFAULT_CONFIG.installEntryPoint,
	protectedFiles: DEFAULT_CONFIG.protectedFiles,
	disabledGuards: DEFAULT_CONFIG.disabledGuards,
	overrideTtlMinutes: DEFAULT_CONFIG.overrideTtlMinutes
}

function setupConfig(ctx: CliContext, root: string, force: boolean): void {
	const claudeDir = join(root, '.claude')
	const configPath = join(claudeDir, CONFIG_FILE)

	if (!existsSync(claudeDir)) {
		mkdirSync(claudeDir, { recursive: true })
		ctx.stdout('Created .claude/ directory')
	}

	if (!existsSync(configPath) || force) {
		writeFileSync(configPath, `${ JSON.stringify(STARTER_CONFIG, null, 2) }\n`)
		ctx.stdout(`Created .claude/${ CONFIG_FILE }`)
	} else {
		ctx.stdout(`.claude/${ CONFIG_FILE } already exists (use --force to overwrite)`)
	}
}

function readSettings(ctx: CliContext, settingsPath: string): ClaudeSettings | null {
	if (!existsSync(settingsPath)) {return {}}

	let json: unknown
	try {
		json = JSON.parse(readFileSync(settingsPath, 'utf-8'))
	} catch {
		ctx.stderr('Warning: Could not parse existing settings.local.json; leaving it untouched')
		return null
	}

	const parsed = settingsSchema.safeParse(json)
	if (!parsed.success) {
		ctx.stderr('Warning: Unexpected shape in settings.local.json; leaving it untouched')
		return null
	}
	return parsed.data
}

function setupClaudeHooks(ctx: CliContext, root: string): boolean {
	const settingsPath = join(root, '.claude', 'settings.local.json')
	const settings = readSettings(ctx, settingsPath)
	if (!settings) {return false}

	const hooks = settings.hooks ?? {}
	const existing = hooks.PreToolUse ?? []
	const registered = existing.some(
		entry => entry.hooks?.some(hook => hook.command?.startsWith(HOOK_COMMAND))
	)

	if (registered) {
		ctx.stdout('PreToolUse hook already configured')
		return true
	}

	hooks.PreToolUse = [
		...existing,
		{ matcher: HOOK_MATCHER, hooks: [ { type: 'command', command: HOOK_COMMAND } ] }
	]
	writeFileSync(settingsPath, `${ JSON.stringify({ ...settings, hooks }, null, 2) }\n`)
	ctx.stdout('Updated .claude/settings.local.json with the PreToolUse hook')
	return true
}

function setupGitignore(ctx: CliContext, root: string): void {
	const gitignorePath = join(root, '.gitignore')
	const entry = `${ STATE_DIR.split('\\').join('/') }/`

	const current = existsSync(gitignorePath) ? readFileSync(gitignorePath, 'utf-8') : ''
	if (current.split('\n').some(line => line.trim() === entry)) {return}

	appendFileSync(gitignorePath, `${ current && !current.endsWith('\n') ? '\n' : '' }${ entry }\n`)
	ctx.stdout(`Added ${ entry } to .gitignore`)
}

export async function runInit(args: string[], ctx: CliContext): Promise<number> {
	const force = args.includes('--force')
	const root = findGitRoot(ctx.cwd) ?? ctx.cwd

	ctx.stdout('Setting up hookwarden...\n')

	setupConfig(ctx, root, force)
	const hooked = setupClaudeHooks(ctx, root)
	setupGitignore(ctx, root)

	ctx.stdout('')
	ctx.stdout('Operator commands:')
	ctx.stdout('  hookwarden override issue   # mint a single-use override code')
	ctx.stdout('  hookwarden audit stats      # what has been blocked')
	ctx.stdout('  hookwarden guards           # what is checked')
	ctx.stdout('')
	ctx.stdout('Restart the agent so it picks up the new hook.')

	return hooked ? 0 : 1
}
