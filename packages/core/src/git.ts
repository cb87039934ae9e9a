/**
 * Git utilities: repository root discovery, working tree state
 */

import { execSync } from 'child_process'
import { existsSync } from 'fs'
import { dirname, join, resolve } from 'path'

/**
 * Walk up from `dir` to the nearest directory containing `.git`
 */
export function findGitRoot(dir: string = '.'): string | null {
	let current = resolve(dir)

	while (current) {
		if (existsSync(join(current, '.git'))) {
			return current
		}

		const parent = dirname(current)
		if (parent === current) {break}
		current = parent
	}

	return null
}

/**
 * Project root: the configured one, else the enclosing git root, else `cwd`
 */
export function resolveProjectRoot(cwd: string, configured?: string): string {
	if (configured) {
		return resolve(cwd, configured)
	}
	return findGitRoot(cwd) ?? resolve(cwd)
}

/**
 * Does the working tree at `dir` hold uncommitted or untracked changes?
 * When git cannot answer (not a repository, git missing) the tree counts as dirty.
 */
export function hasUncommittedChanges(dir: string = '.'): boolean {
	try {
		const status = execSync('git status --porcelain', {
			cwd: dir,
			encoding: 'utf8',
			stdio: [ 'pipe', 'pipe', 'pipe' ]
		})
		return status.trim() !== ''
	} catch {
		return true
	}
}
