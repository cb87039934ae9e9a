/**
 * force-push: no history rewrites on the remote
 */

import type { Guard, HookEvent } from '../types.js'
import { bashCommands, block, pass } from './common.js'

const NAME = 'force-push'

export function createForcePushGuard(): Guard {
	return {
		name: NAME,
		description: 'Blocks git push --force (--force-with-lease is allowed)',
		tools: [ 'Bash' ],
		patterns: [],

		check(event: HookEvent) {
			for (const info of bashCommands(event)) {
				if (info.cmd !== 'git' || info.subcommand !== 'push') {continue}

				const forced = info.flags.includes('force') || info.flags.includes('f')
				// `git push origin +main` forces that refspec
				const forcedRefspec = info.subArgs?.find(arg => arg.startsWith('+'))

				if (forced || forcedRefspec) {
					return block(
						NAME,
						forced ? 'git push --force rewrites remote history' : `refspec ${ forcedRefspec } force-pushes`,
						'Use git push --force-with-lease, or push a new branch'
					)
				}
			}

			return pass(NAME)
		}
	}
}
