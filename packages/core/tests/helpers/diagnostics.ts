import { vi } from "vitest"
import type { Diagnostics } from "@/log"

/**
 * Diagnostics whose callbacks are all spies, so tests can assert on what was
 * reported without capturing log output.
 */
export function recordingDiagnostics() {
	return {
		onDuplicatePackage: vi.fn<Diagnostics["onDuplicatePackage"]>(),
		onLockfileVersion: vi.fn<Diagnostics["onLockfileVersion"]>(),
		onMixedKindGroup: vi.fn<Diagnostics["onMixedKindGroup"]>(),
		onPlatformParseError: vi.fn<Diagnostics["onPlatformParseError"]>(),
	} satisfies Diagnostics
}
