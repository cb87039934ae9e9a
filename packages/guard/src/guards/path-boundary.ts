/**
 * path-boundary: keep `cd` inside the project
 *
 * Targets resolve against the event's working directory and every earlier
 * `cd` on the same command line, so `cd src && cd ../..` is caught.
 */

import { homedir } from 'os'
import { resolve } from 'path'

import type { ResolvedConfig } from '../config.js'
import type { Guard, HookEvent } from '../types.js'
import { bashCommands, block, expandHome, isWithin, pass } from './common.js'

const NAME = 'path-boundary'
const DIRECTORY_COMMANDS = new Set([ 'cd', 'pushd' ])

export function createPathBoundaryGuard(config: ResolvedConfig): Guard {
	const roots = [ config.projectRoot, ...config.allowedPaths ]

	return {
		name: NAME,
		description: 'Blocks cd/pushd outside the project root and allowed paths',
		tools: [ 'Bash' ],
		patterns: [],

		check(event: HookEvent) {
			let dir = resolve(event.workingDirectory)

			for (const info of bashCommands(event)) {
				if (!DIRECTORY_COMMANDS.has(info.cmd)) {continue}

				const target = info.args[0]
				if (target === '-') {continue}

				let next: string
				if (target === undefined) {
					next = homedir()
				} else {
					const expanded = expandHome(target)
					if (expanded === null) {
						return block(
							NAME,
							`cannot resolve ${ info.cmd } target "${ target }"`,
							'Use a literal path inside the project'
						)
					}
					next = resolve(dir, expanded)
				}

				if (!roots.some(root => isWithin(root, next))) {
					return block(
						NAME,
						`${ info.cmd } to ${ next } leaves the project root ${ config.projectRoot }`,
						'Stay inside the project, or add the directory to allowedPaths'
					)
				}
				dir = next
			}

			return pass(NAME)
		}
	}
}
