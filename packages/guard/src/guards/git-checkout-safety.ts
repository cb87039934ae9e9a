/**
 * git-checkout-safety: no silently discarded work
 *
 * Hard resets, forced cleans and worktree restores always block. Checking
 * out or switching to another branch, or checking out `.`, blocks only while
 * the working tree has uncommitted changes.
 */

import { hasUncommittedChanges } from '@hookwarden/core'

import type { CommandInfo, Guard, HookEvent } from '../types.js'
import { bashCommands, block, pass } from './common.js'

const NAME = 'git-checkout-safety'

export interface GitCheckoutSafetyOptions {
	/** Reports uncommitted changes in a directory; defaults to `git status --porcelain` */
	isDirty?: (dir: string) => boolean;
}

const SUGGESTION = 'Commit or stash your work first (git stash push -m "wip")'

/** Words after the git subcommand */
function subcommandWords(info: CommandInfo): string[] {
	const at = info.subcommand === undefined ? -1 : info.raw.indexOf(info.subcommand)
	return at === -1 ? [] : info.raw.slice(at + 1)
}

function flagsOf(words: string[]): string[] {
	return words.flatMap(word => {
		if (word.startsWith('--')) {return word.length > 2 ? [ word.slice(2).split('=')[0] ] : []}
		if (word.startsWith('-') && word.length > 1) {return [ ...word.slice(1) ]}
		return []
	})
}

function checkCheckout(words: string[], flags: string[], dirty: () => boolean): string | null {
	if ([ 'b', 'B', 'orphan' ].some(flag => flags.includes(flag))) {return null}
	if (flags.includes('f') || flags.includes('force')) {
		return 'git checkout --force discards uncommitted changes'
	}
	// `git checkout -- <file>` restores named files only
	if (words.includes('--')) {return null}

	const target = words.find(word => !word.startsWith('-'))
	if (target === undefined || !dirty()) {return null}
	return target === '.'
		? 'git checkout . discards uncommitted changes'
		: `git checkout ${ target } with uncommitted changes in the working tree`
}

function checkSwitch(words: string[], flags: string[], dirty: () => boolean): string | null {
	if ([ 'c', 'C', 'create', 'force-create', 'orphan' ].some(flag => flags.includes(flag))) {return null}
	if ([ 'discard-changes', 'f', 'force' ].some(flag => flags.includes(flag))) {
		return 'git switch --discard-changes throws away uncommitted changes'
	}

	const target = words.find(word => !word.startsWith('-'))
	if (target === undefined || !dirty()) {return null}
	return `git switch ${ target } with uncommitted changes in the working tree`
}

function checkCommand(info: CommandInfo, dirty: () => boolean): string | null {
	if (info.cmd !== 'git') {return null}

	const words = subcommandWords(info)
	const flags = flagsOf(words)

	switch (info.subcommand) {
		case 'reset': {
			const mode = [ 'hard', 'merge' ].find(flag => flags.includes(flag))
			return mode ? `git reset --${ mode } discards uncommitted changes` : null
		}
		case 'clean': {
			const forced = flags.includes('f') || flags.includes('force')
			const dryRun = flags.includes('n') || flags.includes('dry-run')
			return forced && !dryRun ? 'git clean -f deletes untracked files' : null
		}
		case 'restore': {
			const stagedOnly = (flags.includes('staged') || flags.includes('S')) &&
				!flags.includes('worktree') && !flags.includes('W')
			return stagedOnly ? null : 'git restore without --staged discards working tree changes'
		}
		case 'checkout':
			return checkCheckout(words, flags, dirty)
		case 'switch':
			return checkSwitch(words, flags, dirty)
		default:
			return null
	}
}

export function createGitCheckoutSafetyGuard(options: GitCheckoutSafetyOptions = {}): Guard {
	const isDirty = options.isDirty ?? hasUncommittedChanges

	return {
		name: NAME,
		description: 'Blocks git reset --hard, clean -f, restore and checkouts that drop uncommitted work',
		tools: [ 'Bash' ],
		patterns: [],

		check(event: HookEvent) {
			let dirty: boolean | undefined
			const isTreeDirty = (): boolean => {
				if (dirty === undefined) {
					dirty = isDirty(event.workingDirectory)
				}
				return dirty
			}

			for (const info of bashCommands(event)) {
				const reason = checkCommand(info, isTreeDirty)
				if (reason) {return block(NAME, reason, SUGGESTION)}
			}

			return pass(NAME)
		}
	}
}
