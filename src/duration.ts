import { FatalInputError } from './errors'
import { parseClock } from './timeSlots'
import type { DurationCategory, PresenceStatus } from './types'

const FULL_PRESENCE_SECONDS = 30 * 60

/**
 * Buckets the export's duration text ("45 s", "12 min 30 s", "1 h 2 min 3 s").
 */
export function classifyDuration(text: string): DurationCategory {
	const tokens = text.split(/\s+/).filter(Boolean)
	if (tokens.length === 2) return 'minimal'
	if (tokens.length === 4) {
		const seconds = parseClock([tokens[0], tokens[2]])
		return seconds > FULL_PRESENCE_SECONDS ? 'full' : 'partial'
	}
	if (tokens.length >= 6) return 'full'
	throw new FatalInputError(`Unrecognized duration "${text}"`)
}

export function presenceFor(category: DurationCategory): PresenceStatus {
	return category === 'full' ? 'present' : 'partial'
}
