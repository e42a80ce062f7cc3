import en from './locales/en.json'
import ru from './locales/ru.json'
import { CONSULTATION } from './types'
import type { DurationCategory, Lateness, PresenceStatus, TimeSlot } from './types'

export interface ReportLocale {
	reportFilePrefix: string
	defaultTitle: string
	header: { title: string; date: string; timeSlot: string }
	period: string
	consultation: string
	guest: string
	columns: { group: string; fullName: string; presence: string; lateness: string; duration: string }
	presence: Record<PresenceStatus, string>
	lateness: Record<Lateness, string>
	duration: Record<DurationCategory, string>
}

export const LOCALES = { en, ru } satisfies Record<string, ReportLocale>

export type LocaleName = keyof typeof LOCALES

export function getLocale(name: LocaleName): ReportLocale {
	return LOCALES[name]
}

export function formatTimeSlot(slot: TimeSlot, locale: ReportLocale): string {
	return slot === CONSULTATION ? locale.consultation : locale.period.replace('{n}', String(slot))
}
