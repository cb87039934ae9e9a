import type { ResolvedConfig } from '../config.js'
import type { Guard } from '../types.js'
import { createBypassPatternGuard } from './bypass-pattern.js'
import { createEngineProtectionGuard } from './engine-protection.js'
import { createForcePushGuard } from './force-push.js'
import { createGitCheckoutSafetyGuard } from './git-checkout-safety.js'
import { createGitHookProtectionGuard } from './git-hook-protection.js'
import { createInstallScriptGuard } from './install-script.js'
import { createMockCodeGuard } from './mock-code.js'
import { createPathBoundaryGuard } from './path-boundary.js'
import { createScriptIntegrityGuard } from './script-integrity.js'
import { createTempFileLocationGuard } from './temp-file-location.js'

export { createBypassPatternGuard } from './bypass-pattern.js'
export { createEngineProtectionGuard } from './engine-protection.js'
export { createForcePushGuard } from './force-push.js'
export { createGitCheckoutSafetyGuard, type GitCheckoutSafetyOptions } from './git-checkout-safety.js'
export { createGitHookProtectionGuard } from './git-hook-protection.js'
export { createInstallScriptGuard } from './install-script.js'
export { createMockCodeGuard } from './mock-code.js'
export { createPathBoundaryGuard } from './path-boundary.js'
export { createScriptIntegrityGuard } from './script-integrity.js'
export { createTempFileLocationGuard } from './temp-file-location.js'

/**
 * Built-in guards in evaluation (and report) order
 */
export function builtinGuards(config: ResolvedConfig): Guard[] {
	return [
		createPathBoundaryGuard(config),
		createInstallScriptGuard(config),
		createBypassPatternGuard(),
		createScriptIntegrityGuard(config),
		createGitHookProtectionGuard(),
		createForcePushGuard(),
		createGitCheckoutSafetyGuard(),
		createEngineProtectionGuard(config),
		createMockCodeGuard(),
		createTempFileLocationGuard(config)
	]
}
