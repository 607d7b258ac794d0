import { statusIcon, type ScreenSession } from '../domain/session.ts';

const MISSING_ID = '-';

/** Rows for `--list`: status icon, one-based number, name and id. */
export function formatSessionList(sessions: ReadonlyArray<ScreenSession>): Array<string> {
	if (sessions.length === 0) return ['no open sessions'];
	return sessions.map(
		(session, index) =>
			`    ${statusIcon(session.status)}${index + 1} ${session.name} (${session.id ?? MISSING_ID})`,
	);
}

/** Rows for the selection prompt. */
export function formatSelectionList(sessions: ReadonlyArray<ScreenSession>): Array<string> {
	return sessions.map(
		(session, index) =>
			`#${index + 1} ${session.name} (${session.id ?? MISSING_ID}) [${session.status}]`,
	);
}
