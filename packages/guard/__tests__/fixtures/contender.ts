/**
 * Child process for the cross-process tests
 *
 *   contender.ts consume <store> <code> <startAt>
 *   contender.ts append <log> <index> <startAt>
 *
 * Waits until `startAt` (epoch ms) so every child acts at once, then prints
 * its result on stdout.
 */

import { describeError } from '@hookwarden/core'
import { setTimeout as sleep } from 'timers/promises'

import { aggregate } from '../../src/aggregator.js'
import { AuditLog, buildAuditRecord } from '../../src/audit.js'
import { OverrideStore } from '../../src/override.js'
import { bash } from '../helpers.js'

const [ action, path, arg, startAt ] = process.argv.slice(2)

async function run(): Promise<string> {
	await sleep(Math.max(0, Number(startAt) - Date.now()))

	switch (action) {
		case 'consume': {
			const store = new OverrideStore(path, { busyTimeoutMs: 10_000 })
			try {
				return String(store.validateAndConsume(arg))
			} finally {
				store.close()
			}
		}
		case 'append': {
			const record = buildAuditRecord(bash(`echo ${ arg }`), aggregate([]), { presented: false })
			await new AuditLog(path, { timeoutMs: 10_000 }).append(record)
			return 'appended'
		}
		default:
			throw new Error(`unknown action "${ action }"`)
	}
}

run().then(
	result => {
		process.stdout.write(result)
	},
	(error: unknown) => {
		process.stderr.write(`${ describeError(error) }\n`)
		process.exitCode = 1
	}
)
