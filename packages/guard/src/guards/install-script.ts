/**
 * install-script: one installer per project
 */

import { basename } from 'path'

import type { ResolvedConfig } from '../config.js'
import { describePattern, findMatches, type PatternSet, regex } from '../patterns.js'
import { FILE_TOOLS, type Guard, type HookEvent } from '../types.js'
import { bashWriteTargets, block, isFileTool, pass } from './common.js'

const NAME = 'install-script'

export const INSTALL_SCRIPT_NAMES: PatternSet = [
	regex('^install.*\\.sh$', 'install*.sh'),
	regex('^setup.*\\.sh$', 'setup*.sh'),
	regex('^deploy.*\\.sh$', 'deploy*.sh'),
	regex('install.*claude.*\\.sh$', '*install*claude*.sh'),
	regex('setup.*claude.*\\.sh$', '*setup*claude*.sh'),
	regex('install.*hook.*\\.sh$', '*install*hook*.sh'),
	regex('install.*mcp.*\\.sh$', '*install*mcp*.sh')
]

export const CLAUDE_DIR_WRITES: PatternSet = [
	regex('\\b(?:cp|mv|rm|mkdir|install|ln)\\b[^\\n]*(?:~|\\$HOME|\\$\\{HOME\\})/\\.claude\\b', 'modifies ~/.claude')
]

const SUGGESTION = 'Extend the existing installer instead of adding another one'

export function createInstallScriptGuard(config: ResolvedConfig): Guard {
	const entryPoint = basename(config.installEntryPoint)

	const checkName = (path: string): string | null => {
		const name = basename(path)
		if (name === entryPoint) {return null}
		const hit = findMatches(INSTALL_SCRIPT_NAMES, name)[0]
		return hit ? `${ name } matches installation script name ${ describePattern(hit) }; only ${ entryPoint } may install` : null
	}

	return {
		name: NAME,
		description: `Blocks new installation scripts other than ${ entryPoint }`,
		tools: [ ...FILE_TOOLS, 'Bash' ],
		patterns: [ ...INSTALL_SCRIPT_NAMES, ...CLAUDE_DIR_WRITES ],

		check(event: HookEvent) {
			if (isFileTool(event) && event.filePath) {
				const reason = checkName(event.filePath)
				if (reason) {return block(NAME, reason, SUGGESTION)}

				if (basename(event.filePath) !== entryPoint && event.newContent) {
					const hit = findMatches(CLAUDE_DIR_WRITES, event.newContent)[0]
					if (hit) {
						return block(NAME, `content ${ describePattern(hit) } outside ${ entryPoint }`, SUGGESTION)
					}
				}
			}

			if (event.command !== undefined) {
				for (const target of bashWriteTargets(event)) {
					if (target.action !== 'write') {continue}
					const reason = checkName(target.path)
					if (reason) {return block(NAME, reason, SUGGESTION)}
				}
			}

			return pass(NAME)
		}
	}
}
