import type { AttendanceRecord, GroupLookup, RosterEntry } from './types'

/**
 * Appends an absent record for every roster member of an attending group who
 * does not appear in `observed`. Names are compared as exact strings.
 */
export function reconcileRoster(
	observed: readonly AttendanceRecord[],
	roster: readonly RosterEntry[],
	lookup: GroupLookup,
): AttendanceRecord[] {
	const groups = new Set(observed.map((m) => m.group))

	const seen = new Map<string, boolean>()
	for (const entry of roster) {
		if (groups.has(entry.group)) seen.set(entry.fullName, false)
	}

	for (const m of observed) {
		if (seen.has(m.fullName)) seen.set(m.fullName, true)
	}

	const absent: AttendanceRecord[] = []
	for (const [fullName, present] of seen) {
		if (present) continue
		absent.push({
			group: lookup.lookupGroup(fullName),
			fullName,
			presence: 'absent',
		})
	}
	return [...observed, ...absent]
}
