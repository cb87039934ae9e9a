/**
 * script-integrity: protected test and verification files stay as they are
 */

import type { ResolvedConfig } from '../config.js'
import type { WriteTarget } from '../parser.js'
import { describePattern, findMatches, glob } from '../patterns.js'
import { FILE_TOOLS, type Guard, type HookEvent } from '../types.js'
import { bashWriteTargets, block, isFileTool, pass, relativeTo, resolveEventPath } from './common.js'

const NAME = 'script-integrity'

export function createScriptIntegrityGuard(config: ResolvedConfig): Guard {
	const patterns = config.protectedFiles.map(source => glob(source))

	const protectedBy = (path: string): string | null => {
		const hit = findMatches(patterns, relativeTo(config.projectRoot, path))[0]
		return hit ? describePattern(hit) : null
	}

	return {
		name: NAME,
		description: 'Blocks changes to protected test and verification files',
		tools: [ ...FILE_TOOLS, 'Bash' ],
		patterns,

		check(event: HookEvent) {
			const targets: WriteTarget[] = isFileTool(event) && event.filePath
				? [ { path: resolveEventPath(event, event.filePath), action: 'write' } ]
				: bashWriteTargets(event)

			for (const target of targets) {
				const pattern = protectedBy(target.path)
				if (pattern) {
					return block(
						NAME,
						`${ target.action === 'delete' ? 'deleting' : 'modifying' } ${ relativeTo(config.projectRoot, target.path) } (protected: ${ pattern })`,
						'Protected files change only with an operator override code'
					)
				}
			}

			return pass(NAME)
		}
	}
}
