/**
 * mock-code: written code exercises real behaviour, not mocks or simulations
 */

import { describePattern, findMatches, literal, matchesAny, type PatternSet, regex } from '../patterns.js'
import { FILE_TOOLS, type Guard, type HookEvent } from '../types.js'
import { block, isFileTool, pass } from './common.js'

const NAME = 'mock-code'

export const MOCK_CODE: PatternSet = [
	literal('@mock.patch', '@mock.patch', true),
	literal('unittest.mock', 'unittest.mock', true),
	literal('MagicMock', 'MagicMock'),
	regex('\\bMock\\(\\)', 'Mock()', ''),
	regex('\\bpatch\\.object\\(', 'patch.object()', ''),
	regex('\\b(?:jest|vi)\\.mock\\(', 'module mock', ''),
	literal('SIMULATION:', 'SIMULATION: marker'),
	regex('if.*test_mode.*return.*fake', 'fake result in test mode'),
	regex('\\bmock_\\w*\\s*=(?!=)', 'mock_* assignment')
]

export function createMockCodeGuard(): Guard {
	return {
		name: NAME,
		description: 'Blocks mock and simulation code in written files',
		tools: FILE_TOOLS,
		patterns: MOCK_CODE,

		check(event: HookEvent) {
			if (!isFileTool(event) || !event.newContent || !matchesAny(MOCK_CODE, event.newContent)) {
				return pass(NAME)
			}

			const hits = findMatches(MOCK_CODE, event.newContent)
			return block(
				NAME,
				`content contains ${ hits.map(describePattern).join(', ') }`,
				'Test against the real implementation, or ask the operator for an override'
			)
		}
	}
}
