import { closestMatch } from '../lib/similarity.ts';

export const SESSION_STATUSES = [
	'unknown',
	'attached',
	'detached',
	'multi',
	'unreachable',
	'dead',
] as const;

export type SessionStatus = (typeof SESSION_STATUSES)[number];

/**
 * One screen session as reported by `screen -ls`, or a session about to be
 * created (no `id`, status `unknown`).
 */
export interface ScreenSession {
	readonly name: string;
	readonly id?: string;
	readonly status: SessionStatus;
}

export function makeSession(
	name: string,
	id?: string,
	status: SessionStatus = 'unknown',
): ScreenSession {
	return id === undefined ? { name, status } : { name, id, status };
}

/** Maps a raw screen status token onto the closest known status. */
export function classifyStatus(token: string | undefined): SessionStatus {
	if (token === undefined || token.length === 0) return 'unknown';
	return closestMatch(token, SESSION_STATUSES) ?? 'unknown';
}

export function isUnreachable(session: ScreenSession): boolean {
	return session.status === 'unreachable' || session.status === 'dead';
}

/** `<id>.<name>`, the form screen accepts to address a session unambiguously. */
export function qualifiedName(session: ScreenSession): string {
	return session.id === undefined ? session.name : `${session.id}.${session.name}`;
}

/** Splits `<id>.<name>` on the first period; names may contain periods. */
export function splitQualifiedName(
	value: string,
): { id: string; name: string } | undefined {
	const separator = value.indexOf('.');
	if (separator === -1) return undefined;
	const id = value.slice(0, separator);
	const name = value.slice(separator + 1);
	if (id.length === 0 || name.length === 0) return undefined;
	return { id, name };
}

const STATUS_ICONS: Record<SessionStatus, string> = {
	unknown: '?',
	attached: '>',
	detached: '#',
	multi: '>',
	unreachable: '?',
	dead: 'X',
};

export function statusIcon(status: SessionStatus): string {
	return STATUS_ICONS[status];
}
