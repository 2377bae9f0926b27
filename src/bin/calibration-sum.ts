#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper - single point of process.exit
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) time/space (delegates to APP)

import { main } from "../main.js";

/**
 * CLI entry point for calibration-sum.
 *
 * @remarks
 * - @pure false (process termination and console I/O)
 * - @invariant exit code is 0 when the sum was printed, otherwise 1
 * - @postcondition process terminates exactly once with ExitCode ∈ {0,1}
 */
void (async (): Promise<void> => {
	try {
		const code = await main();
		process.exit(code);
	} catch (error) {
		// Defects only; typed failures are reported by APP
		console.error("Fatal error:", error);
		process.exit(1);
	}
})();
