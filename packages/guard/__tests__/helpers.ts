import { execFile } from 'child_process'
import { fileURLToPath } from 'url'
import { promisify } from 'util'

import { DEFAULT_CONFIG, type ResolvedConfig, resolveConfig } from '../src/config.js'
import type { HookEvent, ToolName } from '../src/types.js'

export const ROOT = '/work/project'

export function testConfig(overrides: Partial<ResolvedConfig> = {}): ResolvedConfig {
	return resolveConfig({ ...DEFAULT_CONFIG, projectRoot: ROOT, ...overrides }, ROOT)
}

export function bash(command: string): HookEvent {
	return {
		toolName: 'Bash',
		command,
		workingDirectory: ROOT,
		timestamp: '2026-01-15T10:00:00.000Z'
	}
}

export function fileEvent(toolName: ToolName, filePath: string, newContent: string = ''): HookEvent {
	return {
		toolName,
		filePath,
		newContent,
		workingDirectory: ROOT,
		timestamp: '2026-01-15T10:00:00.000Z'
	}
}

const execFileAsync = promisify(execFile)
const CONTENDER = fileURLToPath(new URL('./fixtures/contender.ts', import.meta.url))

/**
 * Start `count` separate node processes running the contender fixture; they
 * all act at the same moment. Resolves to each one's stdout, in start order.
 */
export async function runContenders(count: number, args: (index: number) => string[]): Promise<string[]> {
	const startAt = String(Date.now() + 1500)
	const runs = Array.from({ length: count }, (_, index) =>
		execFileAsync(process.execPath, [ '--import', 'tsx', CONTENDER, ...args(index), startAt ])
	)
	return (await Promise.all(runs)).map(({ stdout }) => stdout)
}
