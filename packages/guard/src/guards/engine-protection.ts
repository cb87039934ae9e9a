/**
 * engine-protection: the agent under watch cannot reconfigure its watcher
 *
 * Covers the host's hook settings, hookwarden's config file, the override
 * store and audit log (with their journals, locks and rotations), and any
 * attempt to mint an override code from inside the session.
 */

import { basename, dirname, join } from 'path'

import { CONFIG_FILE, ENV_PREFIX, type ResolvedConfig } from '../config.js'
import type { WriteTarget } from '../parser.js'
import { describePattern, findMatches, type PatternSet, regex } from '../patterns.js'
import { FILE_TOOLS, type CommandInfo, type Guard, type HookEvent } from '../types.js'
import {
	bashCommands,
	bashWriteTargets,
	block,
	isFileTool,
	isWithin,
	pass,
	resolveEventPath
} from './common.js'

const NAME = 'engine-protection'
const CLI_NAME = 'hookwarden'
const LAUNCHERS = new Set([ 'npx', 'pnpm', 'yarn', 'bunx', 'node', 'tsx' ])

export const HOST_SETTINGS: PatternSet = [
	regex('^settings(?:\\.[\\w-]+)?\\.json$', 'host hook settings')
]

const SUGGESTION = 'Ask the operator to change hookwarden settings'

export function createEngineProtectionGuard(config: ResolvedConfig): Guard {
	const configFiles = [
		join(config.projectRoot, '.claude', CONFIG_FILE),
		join(config.projectRoot, CONFIG_FILE)
	]
	// Prefixes cover -wal/-shm journals, .lock files and rotations
	const statePrefixes = [ config.overrideStore, config.auditLog ]

	const protectedReason = (path: string, action: WriteTarget['action']): string | null => {
		if (basename(dirname(path)) === '.claude') {
			const hit = findMatches(HOST_SETTINGS, basename(path))[0]
			if (hit) {return describePattern(hit)}
		}
		if (configFiles.includes(path)) {return 'hookwarden config'}
		if (statePrefixes.some(prefix => path.startsWith(prefix))) {return 'hookwarden state'}
		// Removing a directory that holds the state
		if (action === 'delete' && statePrefixes.some(prefix => isWithin(path, prefix))) {return 'hookwarden state'}
		return null
	}

	const invokesOverride = (info: CommandInfo): boolean => {
		const words = [ info.cmd, ...info.raw ]
		const at = words.findIndex(word => basename(word).replace(/\.[cm]?[jt]s$/, '') === CLI_NAME || word.startsWith(`@${ CLI_NAME }/`))
		if (at === -1) {return false}
		if (at > 0 && !LAUNCHERS.has(basename(info.cmd))) {return false}
		return words[at + 1] === 'override'
	}

	const checkCommand = (event: HookEvent, info: CommandInfo): string | null => {
		if (invokesOverride(info)) {
			return 'override codes are issued by the operator, not from the session'
		}

		const exported = info.cmd === 'export' || info.cmd === 'env'
			? info.args.filter(arg => arg.includes('='))
			: []
		const variable = [ ...info.assignments, ...exported ].find(word => word.startsWith(`${ ENV_PREFIX }_`))
		if (variable) {
			return `sets ${ variable.slice(0, variable.indexOf('=')) }`
		}

		if (info.cmd === 'sqlite3' && info.args.some(arg => resolveEventPath(event, arg) === config.overrideStore)) {
			return 'opens the override store'
		}

		return null
	}

	return {
		name: NAME,
		description: 'Blocks changes to hook settings, hookwarden config and state, and session-minted overrides',
		tools: [ 'Bash', ...FILE_TOOLS ],
		patterns: HOST_SETTINGS,

		check(event: HookEvent) {
			if (isFileTool(event) && event.filePath) {
				const path = resolveEventPath(event, event.filePath)
				const reason = protectedReason(path, 'write')
				if (reason) {return block(NAME, `writing ${ event.filePath } (${ reason })`, SUGGESTION)}
			}

			for (const target of bashWriteTargets(event)) {
				const reason = protectedReason(target.path, target.action)
				if (reason) {return block(NAME, `${ target.action === 'delete' ? 'deleting' : 'writing' } ${ target.path } (${ reason })`, SUGGESTION)}
			}

			for (const info of bashCommands(event)) {
				const reason = checkCommand(event, info)
				if (reason) {return block(NAME, reason, SUGGESTION)}
			}

			return pass(NAME)
		}
	}
}
