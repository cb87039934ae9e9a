/**
 * Decision aggregation
 *
 *   CLEAN                       -> ALLOW
 *   VIOLATED + valid override   -> ALLOW_OVERRIDDEN
 *   VIOLATED + no/bad override  -> BLOCK
 *
 * The override check runs only for a violated event, so a code is never
 * spent on an action that would have been allowed anyway. One code covers
 * every block raised for the event.
 */

import type { Decision, Verdict } from './types.js'

function describe(decision: Decision): string {
	return `${ decision.guardName }: ${ decision.reason }`
}

export function aggregate(decisions: Decision[], overrideCheck?: () => boolean): Verdict {
	const blocking = decisions.filter(d => d.blocked)
	const warnings = decisions.filter(d => !d.blocked && d.severity === 'warn').map(describe)

	const base = {
		reasons: blocking.map(describe),
		blockedBy: blocking.map(d => d.guardName),
		warnings,
		decisions
	}

	if (blocking.length === 0) {
		return { state: 'ALLOW', blocked: false, overridden: false, ...base }
	}

	if (overrideCheck?.()) {
		return { state: 'ALLOW_OVERRIDDEN', blocked: false, overridden: true, ...base }
	}

	return { state: 'BLOCK', blocked: true, overridden: false, ...base }
}
