/**
 * git-hook-protection: `.git/hooks` is read-only for agents
 */

import { writeTargets } from '../parser.js'
import { matchesPathComponent } from '../patterns.js'
import type { CommandInfo, Guard, HookEvent } from '../types.js'
import {
	bashCommands,
	block,
	isFileTool,
	pass,
	resolveEventPath,
	setsHooksPath
} from './common.js'

const NAME = 'git-hook-protection'
const HOOKS_DIR = '.git/hooks'

// Commands that change their path arguments in place
const PERMISSION_COMMANDS = new Set([ 'chmod', 'chown', 'chgrp' ])

const SUGGESTION = 'Fix whatever makes the hook fail; hooks change only through the installer'

function touchedPaths(info: CommandInfo): string[] {
	const paths = writeTargets(info).map(target => target.path)
	if (PERMISSION_COMMANDS.has(info.cmd)) {
		paths.push(...info.args)
	}
	return paths
}

function checkCommand(event: HookEvent, info: CommandInfo): string | null {
	for (const path of touchedPaths(info)) {
		if (matchesPathComponent(HOOKS_DIR, resolveEventPath(event, path))) {
			return `${ info.cmd || 'redirect' } changes ${ path } under ${ HOOKS_DIR }`
		}
	}

	if (setsHooksPath(info)) {
		return 'core.hooksPath would point git away from the installed hooks'
	}

	if (info.cmd === 'git' && info.subcommand === 'config' &&
		info.subArgs?.some(arg => /^hooks\./i.test(arg)) &&
		info.subArgs.some(arg => /^(?:false|0|no|off)$/i.test(arg))) {
		return 'git config disables a hook'
	}

	if (info.cmd === 'pre-commit' && info.args[0] === 'uninstall') {
		return 'pre-commit uninstall removes the installed hooks'
	}

	return null
}

export function createGitHookProtectionGuard(): Guard {
	return {
		name: NAME,
		description: 'Blocks removing, renaming or rewriting git hooks',
		tools: [ 'Bash', 'Write', 'Edit', 'MultiEdit' ],
		patterns: [],

		check(event: HookEvent) {
			if (isFileTool(event) && event.filePath &&
				matchesPathComponent(HOOKS_DIR, resolveEventPath(event, event.filePath))) {
				return block(NAME, `writing ${ event.filePath } under ${ HOOKS_DIR }`, SUGGESTION)
			}

			for (const info of bashCommands(event)) {
				const reason = checkCommand(event, info)
				if (reason) {return block(NAME, reason, SUGGESTION)}
			}

			return pass(NAME)
		}
	}
}
