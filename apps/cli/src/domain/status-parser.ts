import { Effect } from 'effect';
import {
	classifyStatus,
	makeSession,
	splitQualifiedName,
	type ScreenSession,
} from './session.ts';

const FIELD_SEPARATOR = '\u001f';

/**
 * Parses `screen -ls` output. The first line is a header and the last two are
 * the socket summary; every line in between describes one session:
 *
 *   \t12345.work\t(10/18/2026 02:00:00 PM)\t(Detached)
 */
export function parseSessionListing(
	raw: string,
): Effect.Effect<Array<ScreenSession>> {
	return Effect.gen(function* () {
		const lines = raw
			.replaceAll('\t', FIELD_SEPARATOR)
			.replaceAll('\r', '')
			.split('\n')
			.slice(1, -2);

		const sessions: Array<ScreenSession> = [];

		for (const line of lines) {
			const fields = line.split(FIELD_SEPARATOR);
			const identifier = fields[1];
			const parsed =
				identifier === undefined ? undefined : splitQualifiedName(identifier.trim());
			if (parsed === undefined) {
				yield* Effect.logWarning(`Skipping unrecognised session line: "${line}"`);
				continue;
			}

			const token = fields
				.slice(2)
				.filter((field) => field.trim().length > 0)
				.at(-1);
			const status = token?.replaceAll('(', '').replaceAll(')', '').trim().toLowerCase();

			sessions.push(makeSession(parsed.name, parsed.id, classifyStatus(status)));
		}

		return sessions;
	});
}
