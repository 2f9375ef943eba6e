/**
 * Progress reporting for long-running reads.
 *
 * Readers accept an `onProgress` callback and default to `logProgress`, which
 * writes each message to the console.
 *
 * @module
 */

import { throttle } from "./throttle"

/**
 * Progress payload containing a message and timestamp.
 */
export type Progress = {
	msg: string
	timestamp: number
}

export type ProgressCallback = (progress: Progress) => void

/**
 * Create a Progress payload with current timestamp.
 * @param msg - The progress message.
 */
export function progress(msg: string): Progress {
	return {
		msg,
		timestamp: Date.now(),
	}
}

/**
 * Log a progress payload's message to the console.
 */
export function logProgress(progress: Progress) {
	console.log(progress.msg)
}

/**
 * Progress reporter that rate limits routine updates.
 *
 * `update` messages are forwarded at most once per `interval` milliseconds;
 * `report` messages (warnings, summaries) are always forwarded.
 *
 * @example
 * ```ts
 * const reporter = createProgressReporter(logProgress, 1_000)
 * for (let i = 0; i < 1_000; i++) reporter.update(`Parsed ${i} blocks`)
 * reporter.report("Finished")
 * ```
 */
export function createProgressReporter(
	onProgress: ProgressCallback = logProgress,
	interval = 1_000,
) {
	const update = throttle((msg: string) => onProgress(progress(msg)), interval)
	return {
		update,
		report(msg: string) {
			onProgress(progress(msg))
		},
	}
}

export type ProgressReporter = ReturnType<typeof createProgressReporter>
