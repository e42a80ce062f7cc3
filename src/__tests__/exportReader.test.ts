import iconv from 'iconv-lite'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { FatalInputError } from '../errors'
import { decodeText, parseExportRows, readExport, readHeader, readParticipants } from '../exportReader'
import type { ExportContext } from '../exportReader'
import { createRoster } from '../roster'
import { LESSON_PARTICIPANTS, ROSTER, exportText } from './fixtures'

function context(): ExportContext {
	return {
		identity: { groupPrefixes: ['mp', 'mt'], guestMarkers: ['(Guest)'] },
		lookup: createRoster(ROSTER),
		organizerMarkers: ['Organizer'],
		defaultTitles: ['General'],
		placeholderTitle: 'Untitled meeting',
	}
}

describe('decodeText', () => {
	const text = 'Meeting Title\tАлгебра\r\n'

	it('reads UTF-16 little endian with a BOM', () => {
		expect(decodeText(iconv.encode(text, 'utf16-le', { addBOM: true }))).toBe(text)
	})

	it('reads UTF-16 big endian with a BOM', () => {
		expect(decodeText(iconv.encode(text, 'utf16-be', { addBOM: true }))).toBe(text)
	})

	it('reads UTF-8 with or without a BOM', () => {
		expect(decodeText(iconv.encode(text, 'utf8', { addBOM: true }))).toBe(text)
		expect(decodeText(Buffer.from(text, 'utf8'))).toBe(text)
	})
})

describe('readHeader', () => {
	const ctx = context()
	const headerRows = (title: string | undefined, start = '10.03.2023, 8:00:00') =>
		parseExportRows(exportText({ title, start, participants: [] }))

	it('takes the title, the date and the period', () => {
		expect(readHeader(headerRows('Algebra'), ctx)).toEqual({ title: 'Algebra', date: '10.03.2023', timeSlot: 1 })
	})

	it('replaces the platform default title', () => {
		expect(readHeader(headerRows('General'), ctx).title).toBe('Untitled meeting')
		expect(readHeader(headerRows(undefined), ctx).title).toBe('Untitled meeting')
	})

	it('marks sessions outside every period as consultation', () => {
		expect(readHeader(headerRows('Office hours', '10.03.2023, 6:00:00'), ctx).timeSlot).toBe('consultation')
	})

	it('fails on a truncated summary', () => {
		expect(() => readHeader(headerRows('Algebra').slice(0, 5), ctx)).toThrow(FatalInputError)
	})
})

describe('readParticipants', () => {
	beforeEach(() => {
		vi.spyOn(console, 'log').mockImplementation(() => {})
		vi.spyOn(console, 'warn').mockImplementation(() => {})
	})
	afterEach(() => {
		vi.restoreAllMocks()
	})

	const rowsOf = (text: string) => parseExportRows(text).slice(8)

	it('classifies every student and skips the organizer', () => {
		const rows = rowsOf(exportText({ title: 'Algebra', start: '10.03.2023, 8:00:00', participants: LESSON_PARTICIPANTS }))
		expect(readParticipants(rows, context())).toEqual([
			{ group: 'MP-21', fullName: 'Petrov Ivan Ivanovich', lateness: 'on-time', durationCategory: 'full', presence: 'present' },
			{ group: 'MP-21', fullName: 'Sidorova Anna Olegovna', lateness: 'late', durationCategory: 'partial', presence: 'partial' },
			{ group: 'MT-22', fullName: 'Smirnov Pavel Andreevich', lateness: 'on-time', durationCategory: 'minimal', presence: 'partial' },
		])
	})

	it('warns about and drops one-word names', () => {
		const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
		const rows = rowsOf(exportText({ start: '10.03.2023, 8:00:00', participants: LESSON_PARTICIPANTS }))
		readParticipants(rows, context())
		expect(warn).toHaveBeenCalledTimes(1)
		expect(warn).toHaveBeenCalledWith('[Export]', 'Dropping participant with an unusable name', { line: 13, name: 'Mike' })
	})

	it('prefers a group written into the name over the roster', () => {
		const rows = [['Oleg Petrovich Kuznetsov MT-22', '10.03.2023, 8:00:00', '', '40 min 0 s', '', 'Attendee']]
		expect(readParticipants(rows, context())[0]).toMatchObject({ fullName: 'Kuznetsov Oleg Petrovich MT-22', group: 'MT-22' })
	})

	it('marks unknown people as guests', () => {
		const rows = [['Stranger Danger Person', '10.03.2023, 8:00:00', '', '40 min 0 s']]
		expect(readParticipants(rows, context())[0].group).toBe('Guest')
	})

	it('fails on rows without a duration', () => {
		expect(() => readParticipants([['Ivan Ivanovich Petrov', '10.03.2023, 8:00:00']], context())).toThrow(
			'Participant row 9 has 2 fields, expected at least 4',
		)
	})

	it('fails on a malformed join time', () => {
		const rows = [['Ivan Ivanovich Petrov', '10.03.2023 8:00', '', '45 s']]
		expect(() => readParticipants(rows, context())).toThrow(FatalInputError)
	})
})

describe('readExport', () => {
	beforeEach(() => {
		vi.spyOn(console, 'log').mockImplementation(() => {})
		vi.spyOn(console, 'warn').mockImplementation(() => {})
	})
	afterEach(() => {
		vi.restoreAllMocks()
	})

	it('returns the header with the classified members', () => {
		const report = readExport(exportText({ title: 'Algebra', start: '10.03.2023, 8:00:00', participants: LESSON_PARTICIPANTS }), context())
		expect(report.header).toEqual({ title: 'Algebra', date: '10.03.2023', timeSlot: 1 })
		expect(report.members.map((m) => m.fullName)).toEqual([
			'Petrov Ivan Ivanovich',
			'Sidorova Anna Olegovna',
			'Smirnov Pavel Andreevich',
		])
	})
})
