/**
 * Helpers shared by the guard implementations
 */

import { homedir } from 'os'
import { isAbsolute, relative, resolve, sep } from 'path'

import { parseShell, type WriteTarget, writeTargets } from '../parser.js'
import type { CommandInfo, Decision, HookEvent } from '../types.js'

export function pass(guardName: string): Decision {
	return { guardName, blocked: false, severity: 'info', reason: 'no match' }
}

export function block(guardName: string, reason: string, suggestion?: string): Decision {
	return { guardName, blocked: true, severity: 'block', reason, suggestion }
}

export function warn(guardName: string, reason: string, suggestion?: string): Decision {
	return { guardName, blocked: false, severity: 'warn', reason, suggestion }
}

/**
 * Expand a leading `~` or `$HOME`; null when any other expansion remains
 */
export function expandHome(path: string): string | null {
	let expanded = path
	const home = /^(?:~|\$HOME|\$\{HOME\})(?=\/|$)/.exec(path)
	if (home) {
		expanded = homedir() + path.slice(home[0].length)
	}
	return /[$`]/.test(expanded) ? null : expanded
}

/**
 * Absolute form of a path named by an event, relative to its working directory.
 * Unexpandable paths are kept as written so pattern checks still see them.
 */
export function resolveEventPath(event: HookEvent, path: string): string {
	const expanded = expandHome(path)
	if (expanded === null) {return path}
	return resolve(event.workingDirectory, expanded)
}

/**
 * Is `path` `root` itself or somewhere below it?
 */
export function isWithin(root: string, path: string): boolean {
	const rel = relative(root, path)
	return rel === '' || (rel !== '..' && !rel.startsWith(`..${ sep }`) && !isAbsolute(rel))
}

/**
 * Path relative to `root` when inside it, else the path unchanged
 */
export function relativeTo(root: string, path: string): string {
	return isWithin(root, path) ? relative(root, path) : path
}

export function bashCommands(event: HookEvent): CommandInfo[] {
	return event.command ? parseShell(event.command) : []
}

/**
 * Write and delete targets of every command in a Bash event, resolved
 */
export function bashWriteTargets(event: HookEvent): WriteTarget[] {
	return bashCommands(event).flatMap(info => writeTargets(info)).map(target => ({
		...target,
		path: resolveEventPath(event, target.path)
	}))
}

const GIT_CONFIG_READ_FLAGS = new Set([ 'get', 'get-all', 'get-regexp', 'list', 'l' ])

/** `git config core.hooksPath ...` or `git -c core.hooksPath=... <cmd>`, reads excepted */
export function setsHooksPath(info: CommandInfo): boolean {
	if (info.cmd !== 'git') {return false}
	if (info.subcommand === 'config' && info.flags.some(flag => GIT_CONFIG_READ_FLAGS.has(flag))) {return false}
	return info.raw.some(arg => /^core\.hookspath(?:=|$)/i.test(arg))
}

export function isFileTool(event: HookEvent): boolean {
	return event.toolName === 'Write' ||
		event.toolName === 'Edit' ||
		event.toolName === 'MultiEdit' ||
		event.toolName === 'NotebookEdit'
}
