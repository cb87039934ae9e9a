/**
 * Process surroundings a command runs in. Tests pass their own.
 */

import { readStdin } from '@hookwarden/core'

export interface CliContext {
	cwd: string;
	env: NodeJS.ProcessEnv;
	readStdin: () => string;
	/** Primary output (data for scripts) */
	stdout: (line: string) => void;
	/** Diagnostics and hook reports */
	stderr: (line: string) => void;
	now: () => Date;
}

export function processContext(): CliContext {
	return {
		cwd: process.cwd(),
		env: process.env,
		readStdin,
		stdout: line => console.log(line),
		stderr: line => console.error(line),
		now: () => new Date()
	}
}

/**
 * Value of `--name <value>` (or `--name=value`) in `args`
 */
export function optionValue(args: string[], name: string): string | undefined {
	for (let i = 0; i < args.length; i++) {
		const arg = args[i]
		if (arg === `--${ name }`) {return args[i + 1]}
		if (arg.startsWith(`--${ name }=`)) {return arg.slice(name.length + 3)}
	}
	return undefined
}

/**
 * Arguments that are neither options nor option values
 */
export function positionals(args: string[], valueOptions: string[] = []): string[] {
	const result: string[] = []
	for (let i = 0; i < args.length; i++) {
		const arg = args[i]
		if (arg.startsWith('--') && valueOptions.includes(arg.slice(2))) {
			i++
		} else if (!arg.startsWith('-')) {
			result.push(arg)
		}
	}
	return result
}
