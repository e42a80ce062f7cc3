import { FatalInputError } from './errors'
import { GUEST_GROUP } from './types'
import type { GroupLookup, RosterEntry } from './types'
import { parseRows } from './utils/csv'

const LOG_PREFIX = '[Roster]'

/**
 * Reads roster rows of `full name,group` with no header line.
 */
export function parseRoster(text: string, source = 'roster'): RosterEntry[] {
	const rows = parseRows(text, ',', source)
	return rows.map((row, i) => {
		if (row.length < 2) {
			throw new FatalInputError(`${source}: row ${i + 1} needs a name and a group, got "${row.join(',')}"`)
		}
		return { fullName: row[0], group: row[1] }
	})
}

export interface Roster extends GroupLookup {
	readonly entries: readonly RosterEntry[]
}

export function createRoster(entries: RosterEntry[]): Roster {
	const frozen = Object.freeze(entries.map((e) => Object.freeze({ ...e })))
	console.log(LOG_PREFIX, 'Loaded roster', { entries: frozen.length })
	return {
		entries: frozen,
		lookupGroup(fullName) {
			return frozen.find((e) => e.fullName === fullName)?.group ?? GUEST_GROUP
		},
	}
}
