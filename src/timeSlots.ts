import { FatalInputError } from './errors'
import { CONSULTATION } from './types'
import type { Lateness, TimeSlot } from './types'

export interface Window {
	start: number
	end: number
	period: number
}

// Seconds since midnight, closed intervals. Each period window spans the
// class period with 15 minutes of slack on both sides.
export const PERIOD_WINDOWS: readonly Window[] = [
	{ start: 27800, end: 35100, period: 1 },
	{ start: 33900, end: 41100, period: 2 },
	{ start: 39900, end: 47100, period: 3 },
	{ start: 46700, end: 53300, period: 4 },
	{ start: 53100, end: 60300, period: 5 },
	{ start: 59100, end: 66300, period: 6 },
	{ start: 65100, end: 72300, period: 7 },
	{ start: 70700, end: 77900, period: 8 },
]

// Joining from five minutes after the period start until the outer bound of
// its window counts as late.
export const LATENESS_WINDOWS: readonly Window[] = [
	{ start: 29000, end: 35100, period: 1 },
	{ start: 35100, end: 41100, period: 2 },
	{ start: 41100, end: 47100, period: 3 },
	{ start: 47900, end: 53300, period: 4 },
	{ start: 54300, end: 60300, period: 5 },
	{ start: 60300, end: 66300, period: 6 },
	{ start: 66300, end: 72300, period: 7 },
	{ start: 71900, end: 77900, period: 8 },
]

const INTEGER = /^[+-]?\d+$/
const MERIDIEM = /(AM|PM)$/i

function toInt(token: string, unit: string): number {
	if (!INTEGER.test(token)) {
		throw new FatalInputError(`Cannot read ${unit} from "${token}"`)
	}
	return Number.parseInt(token, 10)
}

/**
 * Seconds from colon-separated clock tokens: `[h, m, s]` or `[m, s]`.
 */
export function parseClock(tokens: string[]): number {
	if (tokens.length === 3) {
		return toInt(tokens[0], 'hours') * 3600 + toInt(tokens[1], 'minutes') * 60 + toInt(tokens[2], 'seconds')
	}
	if (tokens.length === 2) {
		return toInt(tokens[0], 'minutes') * 60 + toInt(tokens[1], 'seconds')
	}
	throw new FatalInputError(`Expected 2 or 3 time components, got ${tokens.length}: "${tokens.join(':')}"`)
}

export function parseClockText(text: string): number {
	let compact = text.replace(/\s+/g, '')
	const meridiem = MERIDIEM.exec(compact)?.[1]?.toUpperCase()
	if (!meridiem) return parseClock(compact.split(':'))

	compact = compact.slice(0, -2)
	const tokens = compact.split(':')
	if (tokens.length !== 3) {
		throw new FatalInputError(`Expected hours, minutes and seconds before ${meridiem}: "${text}"`)
	}
	let hours = toInt(tokens[0], 'hours') % 12
	if (meridiem === 'PM') hours += 12
	return parseClock([String(hours), tokens[1], tokens[2]])
}

/**
 * Splits the export's "date, time" cell.
 */
export function splitDateTime(source: string): { date: string; seconds: number } {
	const comma = source.indexOf(',')
	if (comma === -1) {
		throw new FatalInputError(`Expected "date, time", got "${source}"`)
	}
	return {
		date: source.slice(0, comma).trim(),
		seconds: parseClockText(source.slice(comma + 1)),
	}
}

export function classifySlot(seconds: number): TimeSlot {
	const match = PERIOD_WINDOWS.find((w) => seconds >= w.start && seconds <= w.end)
	return match ? match.period : CONSULTATION
}

export function findLatenessWindow(seconds: number): Window | undefined {
	// a point shared by two windows belongs to the later one
	for (let i = LATENESS_WINDOWS.length - 1; i >= 0; i--) {
		const w = LATENESS_WINDOWS[i]
		if (seconds >= w.start && seconds <= w.end) return w
	}
	return undefined
}

export function classifyLateness(seconds: number): Lateness {
	return findLatenessWindow(seconds) ? 'late' : 'on-time'
}
