/**
 * Progress event helpers for long-running reads.
 *
 * Readers report progress through a callback that receives `CustomEvent`s,
 * so the same events can be re-dispatched on an `EventTarget` by callers that
 * want to.
 *
 * @module
 */

/**
 * Progress payload: a message, the time it was created and, for counting
 * stages, how many items have been handled so far.
 */
export type Progress = {
	msg: string
	timestamp: number
	count?: number
}

/** CustomEvent carrying progress details. */
export interface ProgressEvent extends CustomEvent<Progress> {}

/** Callback receiving progress events. */
export type OnProgress = (progress: ProgressEvent) => void

/**
 * Create a Progress payload stamped with the current time.
 */
export function progress(msg: string, count?: number): Progress {
	return count === undefined
		? { msg, timestamp: Date.now() }
		: { msg, timestamp: Date.now(), count }
}

/**
 * Create a ProgressEvent with the given message.
 */
export function progressEvent(msg: string, count?: number): ProgressEvent {
	return new CustomEvent("progress", { detail: progress(msg, count) })
}

/** Extract the message string from a progress event. */
export function progressEventMessage(event: ProgressEvent): string {
	return event.detail.msg
}

/** Log a progress event's message to the console. */
export function logProgress(progress: ProgressEvent) {
	console.log(progressEventMessage(progress))
}

/** Discard progress events. */
export function ignoreProgress(_progress: ProgressEvent) {}
