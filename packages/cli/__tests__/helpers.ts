import { mkdirSync, mkdtempSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'

import type { CliContext } from '../src/context.js'

export const NOW = new Date('2026-01-15T10:00:00.000Z')

export interface TestContext {
	ctx: CliContext;
	out: string[];
	err: string[];
}

/**
 * Temporary project with a `.git` directory, so it is its own root
 */
export function makeProject(): string {
	const dir = mkdtempSync(join(tmpdir(), 'hookwarden-cli-'))
	mkdirSync(join(dir, '.git'))
	return dir
}

export function makeContext(cwd: string, options: { stdin?: string; env?: NodeJS.ProcessEnv; now?: () => Date } = {}): TestContext {
	const out: string[] = []
	const err: string[] = []
	return {
		ctx: {
			cwd,
			env: options.env ?? {},
			readStdin: () => options.stdin ?? '',
			stdout: line => out.push(line),
			stderr: line => err.push(line),
			now: options.now ?? (() => NOW)
		},
		out,
		err
	}
}

export function bashPayload(command: string, cwd: string): string {
	return JSON.stringify({ tool_name: 'Bash', tool_input: { command }, cwd })
}
