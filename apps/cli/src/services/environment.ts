import { Config, Effect, Option } from 'effect';
import { NoConnectedSession } from '../domain/errors.ts';
import { makeSession, splitQualifiedName, type ScreenSession } from '../domain/session.ts';

/**
 * Process environment the commands depend on, read once: `STY` names the
 * screen session this process runs inside, `PWD` the shell's directory.
 */
export class SessionEnvironment extends Effect.Service<SessionEnvironment>()(
	'SessionEnvironment',
	{
		effect: Effect.gen(function* () {
			const sty = yield* Config.option(Config.string('STY'));
			const pwd = yield* Config.option(Config.string('PWD'));

			const currentSessionId = sty.pipe(Option.filter((value) => value.length > 0));
			const workingDirectory = pwd.pipe(Option.filter((value) => value.length > 0));

			const currentSession = currentSessionId.pipe(
				Option.flatMap((value) => Option.fromNullable(splitQualifiedName(value))),
				Option.map(({ id, name }) => makeSession(name, id, 'attached')),
			);

			const requireCurrentSession: Effect.Effect<ScreenSession, NoConnectedSession> =
				Option.match(currentSession, {
					onNone: () =>
						Effect.fail(new NoConnectedSession({ message: 'Not in screen session' })),
					onSome: Effect.succeed,
				});

			return {
				inSession: Option.isSome(currentSessionId),
				currentSession,
				workingDirectory,
				requireCurrentSession,
			};
		}),
	},
) {}
