import { Data, Effect, Option } from 'effect';
import { InvalidName } from './errors.ts';
import { makeSession, type ScreenSession } from './session.ts';

export type ResolvedTarget = Data.TaggedEnum<{
	Target: { readonly session: ScreenSession };
	Ambiguous: { readonly sessions: ReadonlyArray<ScreenSession> };
}>;

export const ResolvedTarget = Data.taggedEnum<ResolvedTarget>();

export function validateSessionName(name: string): Effect.Effect<string, InvalidName> {
	if (/^\d/.test(name)) {
		return Effect.fail(
			new InvalidName({
				message: 'session name must not begin with numeric character',
				sessionName: name,
			}),
		);
	}
	return Effect.succeed(name);
}

/**
 * Picks the session a connect request refers to. A named request always
 * resolves, to the listed session of that name or to a new one; an unnamed
 * request is ambiguous once more than one session is running.
 */
export function resolveTarget(
	requestedName: Option.Option<string>,
	sessions: ReadonlyArray<ScreenSession>,
	defaultName: string,
): Effect.Effect<ResolvedTarget, InvalidName> {
	const name = requestedName.pipe(Option.filter((value) => value.length > 0));

	if (Option.isSome(name)) {
		return validateSessionName(name.value).pipe(
			Effect.map((valid) => {
				const existing = sessions.find((session) => session.name === valid);
				return ResolvedTarget.Target({ session: existing ?? makeSession(valid) });
			}),
		);
	}

	const [first, ...rest] = sessions;
	if (first === undefined) {
		return Effect.succeed(ResolvedTarget.Target({ session: makeSession(defaultName) }));
	}
	if (rest.length === 0) {
		return Effect.succeed(ResolvedTarget.Target({ session: first }));
	}
	return Effect.succeed(ResolvedTarget.Ambiguous({ sessions }));
}
