/**
 * bypass-pattern: no switching off checks, hooks or tests
 */

import { describePattern, findMatches, type PatternSet, regex } from '../patterns.js'
import { FILE_TOOLS, type CommandInfo, type Guard, type HookEvent } from '../types.js'
import { bashCommands, block, isFileTool, pass, setsHooksPath } from './common.js'

const NAME = 'bypass-pattern'

/** Environment variable names that switch off guards, hooks or tests */
export const BYPASS_VARIABLES: PatternSet = [
	regex('^(?:CLAUDE(?:CODE)?[_-]?)?(?:SKIP|DISABLE|BYPASS|NO)[_-]?(?:GUARDS?|HOOKS?)$', 'guard-disabling variable'),
	regex('^GUARDS?[_-]?(?:SKIP|DISABLE|BYPASS)$', 'guard-disabling variable'),
	regex('^TEST[_-]?SKIP$', 'test-skipping variable'),
	regex('^(?:SKIP|BYPASS|DISABLE|NO)[_-]?(?:SLOW[_-]?)?TESTS?$', 'test-skipping variable'),
	regex('^(?:FORCE|ALWAYS)[_-]?PASS$', 'force-pass variable'),
	regex('^IGNORE[_-]?FAIL(?:URE)?S?$', 'failure-ignoring variable'),
	regex('^(?:TEST[_-]?)?FAST[_-]?MODE$', 'fast-mode variable'),
	regex('^SKIP$', 'pre-commit SKIP'),
	regex('^PRE_COMMIT_ALLOW_NO_CONFIG$', 'pre-commit without config')
]

/** Written content that skips or weakens tests and hooks */
export const BYPASS_CONTENT: PatternSet = [
	regex('@pytest\\.mark\\.skip', 'pytest skip marker', ''),
	regex('@unittest\\.skip', 'unittest skip decorator', ''),
	regex('pytest\\.skip\\(', 'pytest skip call', ''),
	regex('\\b(?:it|test|describe)\\.skip\\(', 'skipped test', ''),
	regex('\\bx(?:it|describe|test)\\(', 'disabled test', ''),
	regex('stages:\\s*\\[\\s*(?:manual|push)\\s*\\]', 'pre-commit hook moved out of the commit stage'),
	regex('--(?:fast|quick)["\\s]', 'fast mode flag'),
	regex('-k\\s*["\']not\\s+slow', 'slow tests excluded'),
	regex('\\b(?:TEST_)?FAST_MODE\\b', 'fast mode variable', ''),
	regex('\\bSKIP_SLOW_TESTS\\b', 'slow tests skipped', ''),
	regex('#.*--no-verify', 'comment suggesting --no-verify'),
	regex('#.*skip.*test', 'comment about skipping tests'),
	regex('#.*disable.*hook', 'comment about disabling hooks')
]

const SUGGESTION = 'Fix the failing check instead of switching it off'

/** NAME=value words a command sets for itself or exports */
function assignedVariables(info: CommandInfo): string[] {
	const words = [ ...info.assignments ]
	if (info.cmd === 'export' || info.cmd === 'env' || info.cmd === 'set' || info.cmd === 'declare') {
		words.push(...info.args.filter(arg => arg.includes('=')))
	}
	return words.map(word => word.slice(0, word.indexOf('=')))
}

function checkCommand(info: CommandInfo): string | null {
	for (const variable of assignedVariables(info)) {
		const hit = findMatches(BYPASS_VARIABLES, variable)[0]
		if (hit) {return `sets ${ variable } (${ describePattern(hit) })`}
	}

	if (info.cmd === 'git') {
		if ((info.subcommand === 'commit' || info.subcommand === 'push') && info.flags.includes('no-verify')) {
			return `git ${ info.subcommand } --no-verify skips the git hooks`
		}
		if (info.subcommand === 'commit' && info.flags.includes('n')) {
			return 'git commit -n skips the git hooks'
		}
		if (setsHooksPath(info)) {
			return 'setting core.hooksPath redirects the git hooks'
		}
	}

	if (info.cmd === 'pre-commit' && info.args[0] === 'uninstall') {
		return 'pre-commit uninstall removes the commit hooks'
	}

	return null
}

export function createBypassPatternGuard(): Guard {
	return {
		name: NAME,
		description: 'Blocks commands and content that disable hooks, guards or tests',
		tools: [ 'Bash', ...FILE_TOOLS ],
		patterns: [ ...BYPASS_VARIABLES, ...BYPASS_CONTENT ],

		check(event: HookEvent) {
			for (const info of bashCommands(event)) {
				const reason = checkCommand(info)
				if (reason) {return block(NAME, reason, SUGGESTION)}
			}

			if (isFileTool(event) && event.newContent) {
				const hits = findMatches(BYPASS_CONTENT, event.newContent)
				if (hits.length > 0) {
					return block(NAME, `content contains ${ hits.map(describePattern).join(', ') }`, SUGGESTION)
				}
			}

			return pass(NAME)
		}
	}
}
