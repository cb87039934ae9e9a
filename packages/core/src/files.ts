/**
 * File utilities: rotated log discovery
 */

import { escape, glob } from 'glob'
import { basename, dirname } from 'path'

/**
 * Find a log file and its rotated siblings (`audit.jsonl.2`, `audit.jsonl.1`),
 * highest rotation suffix first and the live file last. Compressed rotations
 * are skipped.
 */
export async function findLogFiles(logPath: string): Promise<string[]> {
	const dir = dirname(logPath)
	const name = basename(logPath)

	const files = await glob(`${ escape(name) }*`, {
		cwd: dir,
		absolute: true,
		nodir: true,
		dot: true,
		ignore: [ '*.gz', '*.lock' ]
	})

	const rotated = files.filter(f => basename(f) !== name).sort().reverse()
	const live = files.filter(f => basename(f) === name)
	return [ ...rotated, ...live ]
}

