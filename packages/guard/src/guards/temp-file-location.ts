/**
 * temp-file-location: scratch files belong outside the project root
 */

import { basename, dirname } from 'path'

import type { ResolvedConfig } from '../config.js'
import { describePattern, findMatches, type PatternSet, regex } from '../patterns.js'
import type { Guard, HookEvent } from '../types.js'
import { pass, resolveEventPath, warn } from './common.js'

const NAME = 'temp-file-location'

export const SCRATCH_PREFIXES: PatternSet = [
	regex('^test_', 'test_*', ''),
	regex('^check_', 'check_*', ''),
	regex('^debug_', 'debug_*', ''),
	regex('^temp_', 'temp_*', ''),
	regex('^quick_', 'quick_*', ''),
	regex('^investigate_', 'investigate_*', '')
]

export function createTempFileLocationGuard(config: ResolvedConfig): Guard {
	return {
		name: NAME,
		description: 'Warns when scratch files are written at the project root',
		tools: [ 'Write' ],
		patterns: SCRATCH_PREFIXES,

		check(event: HookEvent) {
			if (!event.filePath) {return pass(NAME)}

			const path = resolveEventPath(event, event.filePath)
			if (dirname(path) !== config.projectRoot) {return pass(NAME)}

			const hit = findMatches(SCRATCH_PREFIXES, basename(path))[0]
			if (!hit) {return pass(NAME)}

			return warn(
				NAME,
				`${ basename(path) } looks like a scratch file (${ describePattern(hit) }) at the project root`,
				'Put scratch files in a tmp/ or scratch/ directory'
			)
		}
	}
}
