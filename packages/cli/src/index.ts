/**
 * @hookwarden/cli - the hookwarden command
 *
 * CLI commands:
 *   hookwarden pre       - PreToolUse hook
 *   hookwarden override  - Override code administration
 *   hookwarden audit     - Audit log verification and stats
 *   hookwarden guards    - Guard listing
 *   hookwarden init      - Hook registration
 */

export { runCli } from './cli.js'
export { type CliContext, optionValue, positionals, processContext } from './context.js'
export { formatStats, runAudit } from './commands/audit.js'
export { runGuards } from './commands/guards.js'
export { runInit } from './commands/init.js'
export { runOverride } from './commands/override.js'
export { OVERRIDE_ENV, runPre } from './commands/pre.js'
