import { FileSystem, Path } from '@effect/platform';
import { Effect, Either, Option } from 'effect';
import { Action, selectAction, type CliFlags } from '../domain/action.ts';
import { type ActionError, DirectoryError, NoConnectedSession } from '../domain/errors.ts';
import { resolveTarget } from '../domain/resolver.ts';
import { qualifiedName } from '../domain/session.ts';
import { AppConfig } from '../services/config.ts';
import { ConsoleIO } from '../services/console-io.ts';
import { SessionEnvironment } from '../services/environment.ts';
import { ScreenClient } from '../services/screen-client.ts';
import { SessionController } from '../services/session-controller.ts';
import { SessionRegistry } from '../services/session-registry.ts';
import { SelectionPrompt } from './selection-prompt.ts';
import { formatSessionList } from './session-list.ts';

export type AppContext =
	| AppConfig
	| ConsoleIO
	| SelectionPrompt
	| SessionController
	| SessionEnvironment
	| SessionRegistry
	| ScreenClient
	| FileSystem.FileSystem
	| Path.Path;

/** Renders any expected failure as a single `Error: <message>` line. */
export function reportErrors<R>(
	effect: Effect.Effect<void, ActionError, R>,
): Effect.Effect<void, never, R | ConsoleIO> {
	return effect.pipe(
		Effect.catchAll((error) =>
			Effect.gen(function* () {
				const io = yield* ConsoleIO;
				yield* io.writeLine(`Error: ${error.message}`);
			}),
		),
	);
}

export const connectSession = (name: Option.Option<string>) =>
	Effect.gen(function* () {
		const config = yield* AppConfig;
		const registry = yield* SessionRegistry;
		const controller = yield* SessionController;
		const prompt = yield* SelectionPrompt;

		const sessions = yield* registry.list;
		const target = yield* resolveTarget(name, sessions, config.defaultSessionName);

		const session =
			target._tag === 'Target'
				? Option.some(target.session)
				: yield* prompt.select('Please enter session number to reattach:', target.sessions);

		if (Option.isSome(session)) {
			yield* controller.run(session.value);
		}
	});

export const listSessions = Effect.gen(function* () {
	const registry = yield* SessionRegistry;
	const io = yield* ConsoleIO;

	const sessions = yield* registry.list;
	for (const line of formatSessionList(sessions)) {
		yield* io.writeLine(line);
	}
});

export const killSession = (name: Option.Option<string>) =>
	Effect.gen(function* () {
		const registry = yield* SessionRegistry;
		const controller = yield* SessionController;
		const prompt = yield* SelectionPrompt;
		const io = yield* ConsoleIO;

		const sessions = yield* registry.list;
		const named = name.pipe(
			Option.flatMap((value) =>
				Option.fromNullable(sessions.find((session) => session.name === value)),
			),
		);
		const selected = Option.isSome(named)
			? named
			: yield* prompt.select('Please enter session number to kill:', sessions);

		if (Option.isNone(selected)) {
			yield* io.writeLine('No sessions found');
			return;
		}

		const session = selected.value;
		const confirmed = yield* prompt.confirm(
			`Are you sure you want to kill session ${session.name} ?`,
		);
		if (!confirmed) {
			yield* io.writeLine('session kill aborted');
			return;
		}

		yield* controller.kill(session);
		yield* io.writeLine(`${session.name} session killed`);
	});

export const killAllSessions = Effect.gen(function* () {
	const registry = yield* SessionRegistry;
	const controller = yield* SessionController;
	const prompt = yield* SelectionPrompt;
	const io = yield* ConsoleIO;

	const sessions = yield* registry.list;
	if (sessions.length === 0) {
		yield* io.writeLine('No sessions found');
		return;
	}

	const confirmed = yield* prompt.confirm('Are you sure you want to kill all sessions?');
	if (!confirmed) {
		yield* io.writeLine('session kill aborted');
		return;
	}

	// A failed kill is reported and the remaining sessions are still killed.
	const results = yield* Effect.forEach(sessions, (session) =>
		controller.kill(session).pipe(Effect.either),
	);
	const failures = results.filter(Either.isLeft);
	for (const failure of failures) {
		yield* io.writeLine(`Error: ${failure.left.message}`);
	}
	if (failures.length === 0) yield* io.writeLine('all sessions killed');
});

/**
 * Points the current session's default directory at `directory`, or at the
 * shell's working directory when none is given.
 */
export const updateDirectory = (directory: Option.Option<string>) =>
	Effect.gen(function* () {
		const env = yield* SessionEnvironment;
		const fs = yield* FileSystem.FileSystem;
		const path = yield* Path.Path;
		const screen = yield* ScreenClient;
		const io = yield* ConsoleIO;

		const missing = (requested: string) =>
			new DirectoryError({ message: 'Directory does not exist', path: requested });

		let target: string;
		if (Option.isSome(directory)) {
			const requested = path.resolve(directory.value);
			target = yield* fs
				.realPath(requested)
				.pipe(Effect.mapError(() => missing(requested)));
		} else if (Option.isSome(env.workingDirectory)) {
			target = env.workingDirectory.value;
		} else {
			return yield* Effect.fail(
				new DirectoryError({ message: 'could not get current directory' }),
			);
		}

		const info = yield* fs.stat(target).pipe(Effect.option);
		if (Option.isNone(info) || info.value.type !== 'Directory') {
			return yield* Effect.fail(missing(target));
		}

		if (!env.inSession) {
			return yield* Effect.fail(new NoConnectedSession({ message: 'Not in screen session' }));
		}

		yield* screen.changeDirectory(target);
		yield* io.writeLine(`Success: directory changed to '${target}'`);
	});

export const detachSession = Effect.gen(function* () {
	const env = yield* SessionEnvironment;
	const screen = yield* ScreenClient;

	const session = yield* env.requireCurrentSession;
	yield* screen.detach(qualifiedName(session));
});

export function App(flags: CliFlags): Effect.Effect<void, never, AppContext> {
	return Action.$match(selectAction(flags), {
		Detach: () => reportErrors(detachSession),
		ChangeDirectory: ({ directory }) => reportErrors(updateDirectory(directory)),
		List: () => reportErrors(listSessions),
		Kill: ({ name }) => reportErrors(killSession(name)),
		KillAll: () => reportErrors(killAllSessions),
		Connect: ({ name }) => reportErrors(connectSession(name)),
	});
}
