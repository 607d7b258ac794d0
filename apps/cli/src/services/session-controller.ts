import { Effect } from 'effect';
import { ConnectionFailed, type ScreenError, SessionUnreachable } from '../domain/errors.ts';
import { isUnreachable, qualifiedName, type ScreenSession } from '../domain/session.ts';
import { ScreenClient } from './screen-client.ts';

/**
 * Issues the screen command matching a session's observed status. The
 * session is a snapshot; nothing here re-reads or updates it.
 */
export class SessionController extends Effect.Service<SessionController>()(
	'SessionController',
	{
		effect: Effect.gen(function* () {
			const screen = yield* ScreenClient;

			const connect = (
				session: ScreenSession,
			): Effect.Effect<void, ScreenError | SessionUnreachable> => {
				if (session.status === 'unknown') return screen.attach(session.name);
				if (isUnreachable(session)) {
					return Effect.fail(
						new SessionUnreachable({
							message: `Session ${session.name} is unreachable`,
							session,
						}),
					);
				}
				return screen.attach(qualifiedName(session));
			};

			const kill = (session: ScreenSession): Effect.Effect<void, ScreenError> =>
				isUnreachable(session)
					? screen.wipe(qualifiedName(session))
					: screen.terminate(session.id ?? session.name);

			/** Connect, creating the session first when it does not exist yet. */
			const run = (
				session: ScreenSession,
			): Effect.Effect<void, ScreenError | SessionUnreachable | ConnectionFailed> => {
				if (session.status === 'unknown') {
					return screen.createDetached(session.name).pipe(Effect.zipRight(connect(session)));
				}
				if (isUnreachable(session)) {
					return kill(session).pipe(
						Effect.catchTag('ScreenError', (error) => Effect.logDebug(error.message)),
						Effect.zipRight(
							Effect.fail(
								new ConnectionFailed({
									message: 'Unreachable session has been wiped. Please try connecting again',
									session,
								}),
							),
						),
					);
				}
				return connect(session);
			};

			return { run, connect, kill };
		}),
	},
) {}
