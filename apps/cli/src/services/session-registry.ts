import { Effect } from 'effect';
import type { ScreenSession } from '../domain/session.ts';
import { parseSessionListing } from '../domain/status-parser.ts';
import { ScreenClient } from './screen-client.ts';

export class SessionRegistry extends Effect.Service<SessionRegistry>()('SessionRegistry', {
	effect: Effect.gen(function* () {
		const screen = yield* ScreenClient;

		// screen exits non-zero when no sockets exist; a failed invocation is
		// indistinguishable from that and also lists nothing.
		const list: Effect.Effect<Array<ScreenSession>> = screen.listSessions.pipe(
			Effect.flatMap(({ stdout, exitCode }) =>
				exitCode === 0 ? parseSessionListing(stdout) : Effect.succeed([]),
			),
			Effect.catchTag('ScreenError', (error) =>
				Effect.logDebug(`Session listing failed: ${error.message}`).pipe(
					Effect.as([]),
				),
			),
		);

		return { list };
	}),
}) {}
