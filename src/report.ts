import { formatTimeSlot } from './locale'
import type { ReportLocale } from './locale'
import { GUEST_GROUP } from './types'
import type { AttendanceRecord, AttendanceReport, ReportHeader } from './types'
import { unparseRows } from './utils/csv'

export const REPORT_DELIMITER = ';'

function byFullName(a: AttendanceRecord, b: AttendanceRecord): number {
	if (a.fullName < b.fullName) return -1
	if (a.fullName > b.fullName) return 1
	return 0
}

export type GroupLabel = (group: string) => string

const asIs: GroupLabel = (group) => group

function compareGroups(a: AttendanceRecord, b: AttendanceRecord, label: GroupLabel): number {
	const ga = label(a.group)
	const gb = label(b.group)
	if (ga < gb) return -1
	if (ga > gb) return 1
	return 0
}

/** The group as the report prints it. */
export function displayGroup(group: string, locale: ReportLocale): string {
	return group === GUEST_GROUP ? locale.guest : group
}

/**
 * Orders by group, then by name: a name sort followed by a stable group sort.
 * Groups compare by `label`, so the order follows the printed group column.
 */
export function sortMembers(members: readonly AttendanceRecord[], label: GroupLabel = asIs): AttendanceRecord[] {
	return [...members].sort(byFullName).sort((a, b) => compareGroups(a, b, label))
}

export function compareMembers(a: AttendanceRecord, b: AttendanceRecord, label: GroupLabel = asIs): number {
	return compareGroups(a, b, label) || byFullName(a, b)
}

export function assembleReport(
	header: ReportHeader,
	members: readonly AttendanceRecord[],
	label: GroupLabel = asIs,
): AttendanceReport {
	return {
		header,
		members: sortMembers(members.filter((m) => m.fullName !== ''), label),
	}
}

export function renderReport(report: AttendanceReport, locale: ReportLocale): string[][] {
	const { header, members } = report
	const { columns } = locale
	const rows: string[][] = [
		[locale.header.title, header.title],
		[locale.header.date, header.date],
		[locale.header.timeSlot, formatTimeSlot(header.timeSlot, locale)],
		[''],
		[columns.group, columns.fullName, columns.presence, columns.lateness, columns.duration],
	]
	for (const m of members) {
		rows.push([
			displayGroup(m.group, locale),
			m.fullName,
			locale.presence[m.presence],
			m.lateness ? locale.lateness[m.lateness] : '',
			m.durationCategory ? locale.duration[m.durationCategory] : '',
		])
	}
	return rows
}

export function serializeReport(rows: string[][]): string {
	return unparseRows(rows, REPORT_DELIMITER)
}
