export interface IdentityOptions {
	/** Lowercase prefixes (text before the first "-") that mark a group code */
	groupPrefixes: readonly string[]
	guestMarkers: readonly string[]
}

export interface ParsedIdentity {
	fullName: string
	/** Group code written into the display name, if any */
	group?: string
}

/**
 * Turns a "First Middle Last" display name into "Last First Middle" and picks
 * up a group code that some participants type into their name, e.g.
 * "Ivan Petrov (MP-21)". The code keeps its opening parenthesis.
 *
 * Returns null for single-token names: they are registration mistakes and
 * the row is dropped.
 */
export function parseDisplayName(raw: string, options: IdentityOptions): ParsedIdentity | null {
	const tokens = raw.split(/\s+/).filter(Boolean)
	if (tokens.length < 2) return null

	const rotated = tokens.length === 2
		? [tokens[1], tokens[0]]
		: [tokens[2], tokens[0], tokens[1], ...tokens.slice(3)]

	let group: string | undefined
	const cleaned: string[] = []
	for (const token of rotated) {
		if (options.guestMarkers.includes(token)) continue
		const candidate = token.split('-')[0].toLowerCase().replace(/\(/g, '')
		if (options.groupPrefixes.includes(candidate)) {
			group = token.replace(/\)/g, '')
			cleaned.push(group)
			continue
		}
		cleaned.push(token)
	}

	return {
		fullName: cleaned.join(' '),
		...(group ? { group } : {}),
	}
}
