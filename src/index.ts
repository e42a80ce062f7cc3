export * from './types'
export { FatalInputError } from './errors'
export { classifyLateness, classifySlot, findLatenessWindow, parseClock, parseClockText, splitDateTime, PERIOD_WINDOWS, LATENESS_WINDOWS } from './timeSlots'
export { parseDisplayName } from './identity'
export type { IdentityOptions, ParsedIdentity } from './identity'
export { classifyDuration, presenceFor } from './duration'
export { createRoster, parseRoster } from './roster'
export type { Roster } from './roster'
export { reconcileRoster } from './reconcile'
export { assembleReport, compareMembers, displayGroup, renderReport, serializeReport, sortMembers } from './report'
export type { GroupLabel } from './report'
export { decodeText, readExport, readHeader, readParticipants } from './exportReader'
export { findLatestExport, readTextFile, reportFileName, writeReportFile } from './files'
export { loadConfig, resolveConfig } from './config'
export type { AttendanceConfig, ConfigFile } from './config'
export { getLocale, formatTimeSlot } from './locale'
export type { LocaleName, ReportLocale } from './locale'
export { buildReport, createRunContext, runAttendanceReport } from './pipeline'
export type { RunContext, RunOptions, RunResult } from './pipeline'
