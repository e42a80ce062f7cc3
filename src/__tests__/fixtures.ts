import type { RosterEntry } from '../types'

export interface ParticipantRow {
	name: string
	joined: string
	duration: string
	role?: string
}

export function exportText(opts: { title?: string; start: string; participants: ParticipantRow[] }): string {
	const lines = [
		'Meeting Summary',
		'Total Number of Participants\t' + opts.participants.length,
		opts.title === undefined ? 'Meeting Title' : `Meeting Title\t${opts.title}`,
		`Meeting Start Time\t${opts.start}`,
		'Meeting End Time\t10.03.2023, 9:30:00',
		'Meeting Id\ttest-meeting',
		'Attendee Summary',
		'Full Name\tJoin Time\tLeave Time\tDuration\tEmail\tRole',
		...opts.participants.map((p) =>
			[p.name, p.joined, '10.03.2023, 9:30:00', p.duration, 'someone@example.com', p.role ?? 'Attendee'].join('\t'),
		),
	]
	return lines.join('\r\n') + '\r\n'
}

export const ROSTER: RosterEntry[] = [
	{ fullName: 'Petrov Ivan Ivanovich', group: 'MP-21' },
	{ fullName: 'Sidorova Anna Olegovna', group: 'MP-21' },
	{ fullName: 'Kuznetsov Oleg Petrovich', group: 'MP-21' },
	{ fullName: 'Smirnov Pavel Andreevich', group: 'MT-22' },
	{ fullName: 'Volkova Irina Sergeevna', group: 'MT-22' },
	{ fullName: 'Orlov Denis Ilyich', group: 'MK-23' },
]

export const ROSTER_CSV = ROSTER.map((e) => `${e.fullName},${e.group}`).join('\r\n') + '\r\n'

// Period 1 lesson: three students, the organizer and a one-word name
export const LESSON_PARTICIPANTS: ParticipantRow[] = [
	{ name: 'Elena Viktorovna Morozova', joined: '10.03.2023, 7:58:00', duration: '1 h 32 min 0 s', role: 'Organizer' },
	{ name: 'Ivan Ivanovich Petrov', joined: '10.03.2023, 8:01:00', duration: '1 h 29 min 0 s' },
	{ name: 'Anna Olegovna Sidorova', joined: '10.03.2023, 8:10:00', duration: '25 min 10 s' },
	{ name: 'Pavel Andreevich Smirnov', joined: '10.03.2023, 8:02:00', duration: '45 s' },
	{ name: 'Mike', joined: '10.03.2023, 8:03:00', duration: '1 h 0 min 0 s' },
]
