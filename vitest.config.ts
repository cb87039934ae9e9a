import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		include: [ 'packages/*/__tests__/**/*.test.ts' ],
		env: {
			HOOKWARDEN_LOG_LEVEL: 'silent'
		},
		testTimeout: 20_000
	}
})
