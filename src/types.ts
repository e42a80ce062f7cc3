export type Lateness = 'on-time' | 'late'

export type DurationCategory = 'minimal' | 'partial' | 'full'

export type PresenceStatus = 'present' | 'partial' | 'absent'

/** Period number 1-8, or the sentinel for sessions outside every period. */
export type TimeSlot = number | 'consultation'

export const CONSULTATION = 'consultation'

/** Group of a participant the roster does not know. */
export const GUEST_GROUP = 'Guest'

export interface AttendanceRecord {
	group: string
	/**
	 * Canonical "Last First Middle" form; an empty name is dropped from the report
	 */
	fullName: string
	/**
	 * Unset for members synthesized as absent
	 */
	lateness?: Lateness
	durationCategory?: DurationCategory
	presence: PresenceStatus
}

export interface ReportHeader {
	title: string
	date: string // as written in the export
	timeSlot: TimeSlot
}

export interface RosterEntry {
	fullName: string
	group: string
}

export interface GroupLookup {
	lookupGroup: (fullName: string) => string
}

export interface AttendanceReport {
	header: ReportHeader
	members: AttendanceRecord[]
}
