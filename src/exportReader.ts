import iconv from 'iconv-lite'
import { FatalInputError } from './errors'
import { parseDisplayName } from './identity'
import type { IdentityOptions } from './identity'
import { classifyDuration, presenceFor } from './duration'
import { classifyLateness, classifySlot, splitDateTime } from './timeSlots'
import type { AttendanceRecord, AttendanceReport, GroupLookup, ReportHeader } from './types'
import { parseRows } from './utils/csv'

const LOG_PREFIX = '[Export]'

/** Summary lines before the first participant row, column header included. */
export const PREAMBLE_ROWS = 8
const TITLE_ROW = 2
const START_ROW = 3

const NAME_FIELD = 0
const JOINED_FIELD = 1
const DURATION_FIELD = 3
const ROLE_FIELD = 5

export interface ExportContext {
	identity: IdentityOptions
	lookup: GroupLookup
	organizerMarkers: readonly string[]
	defaultTitles: readonly string[]
	/** Title used when the export carries none or only a platform default */
	placeholderTitle: string
}

/**
 * Decodes export or roster bytes, honouring a UTF-16 or UTF-8 byte-order mark.
 * Text without a BOM is read as UTF-8.
 */
export function decodeText(buffer: Buffer): string {
	if (buffer.length >= 2 && buffer[0] === 0xff && buffer[1] === 0xfe) {
		return iconv.decode(buffer, 'utf16-le')
	}
	if (buffer.length >= 2 && buffer[0] === 0xfe && buffer[1] === 0xff) {
		return iconv.decode(buffer, 'utf16-be')
	}
	return iconv.decode(buffer, 'utf8')
}

export function parseExportRows(text: string, source = 'export'): string[][] {
	return parseRows(text, '\t', source)
}

export function readHeader(rows: string[][], ctx: Pick<ExportContext, 'defaultTitles' | 'placeholderTitle'>): ReportHeader {
	if (rows.length < PREAMBLE_ROWS) {
		throw new FatalInputError(`Export has ${rows.length} summary rows, expected ${PREAMBLE_ROWS}`)
	}
	const rawTitle = rows[TITLE_ROW][1]
	const title = rawTitle === undefined || ctx.defaultTitles.includes(rawTitle) ? ctx.placeholderTitle : rawTitle

	const started = rows[START_ROW][1]
	if (started === undefined) {
		throw new FatalInputError('Export is missing the meeting start time')
	}
	const { date, seconds } = splitDateTime(started)
	return { title, date, timeSlot: classifySlot(seconds) }
}

/**
 * Classifies every participant row. Organizer rows are skipped and names that
 * cannot be split into at least two words are dropped with a warning.
 */
export function readParticipants(rows: string[][], ctx: ExportContext): AttendanceRecord[] {
	const members: AttendanceRecord[] = []
	rows.forEach((row, i) => {
		const line = PREAMBLE_ROWS + i + 1
		if (row.length <= DURATION_FIELD) {
			throw new FatalInputError(`Participant row ${line} has ${row.length} fields, expected at least ${DURATION_FIELD + 1}`)
		}
		const role = row[ROLE_FIELD]
		if (role !== undefined && ctx.organizerMarkers.includes(role)) return

		const identity = parseDisplayName(row[NAME_FIELD], ctx.identity)
		if (!identity) {
			console.warn(LOG_PREFIX, 'Dropping participant with an unusable name', { line, name: row[NAME_FIELD] })
			return
		}

		const { seconds } = splitDateTime(row[JOINED_FIELD])
		const durationCategory = classifyDuration(row[DURATION_FIELD])
		members.push({
			group: identity.group ?? ctx.lookup.lookupGroup(identity.fullName),
			fullName: identity.fullName,
			lateness: classifyLateness(seconds),
			durationCategory,
			presence: presenceFor(durationCategory),
		})
	})
	return members
}

export function readExport(text: string, ctx: ExportContext): AttendanceReport {
	const rows = parseExportRows(text)
	const header = readHeader(rows.slice(0, PREAMBLE_ROWS), ctx)
	const members = readParticipants(rows.slice(PREAMBLE_ROWS), ctx)
	console.log(LOG_PREFIX, 'Read export', { title: header.title, date: header.date, participants: members.length })
	return { header, members }
}
