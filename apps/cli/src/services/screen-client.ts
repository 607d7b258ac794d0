import { Command, CommandExecutor } from '@effect/platform';
import { Effect, Stream } from 'effect';
import { ScreenError } from '../domain/errors.ts';
import { AppConfig } from './config.ts';

export interface SessionListing {
	stdout: string;
	exitCode: number;
}

export class ScreenClient extends Effect.Service<ScreenClient>()('ScreenClient', {
	effect: Effect.gen(function* () {
		const config = yield* AppConfig;
		const executor = yield* CommandExecutor.CommandExecutor;
		const binary = config.binary;

		const describe = (args: ReadonlyArray<string>) => [binary, ...args].join(' ');

		const toScreenError = (args: ReadonlyArray<string>) => (error: unknown) =>
			new ScreenError({
				message: error instanceof Error ? error.message : String(error),
				command: describe(args),
			});

		const runCommand = (
			args: Array<string>,
			interactive = false,
		): Effect.Effect<void, ScreenError> =>
			Effect.gen(function* () {
				yield* Effect.logDebug(`Running: ${describe(args)}`);
				const base = Command.make(binary, ...args);
				const command = interactive
					? base.pipe(
							Command.stdin('inherit'),
							Command.stdout('inherit'),
							Command.stderr('inherit'),
						)
					: base;
				const exitCode = yield* executor
					.exitCode(command)
					.pipe(Effect.mapError(toScreenError(args)));
				if (exitCode !== 0) {
					return yield* Effect.fail(
						new ScreenError({
							message: `${describe(args)} exited with code ${exitCode}`,
							command: describe(args),
						}),
					);
				}
			});

		const listSessions: Effect.Effect<SessionListing, ScreenError> = Effect.scoped(
			Effect.gen(function* () {
				const args = ['-ls'];
				yield* Effect.logDebug(`Running: ${describe(args)}`);
				const proc = yield* executor.start(Command.make(binary, ...args));
				const [stdout, exitCode] = yield* Effect.all(
					[
						proc.stdout.pipe(
							Stream.decodeText('utf8'),
							Stream.runFold('', (acc, chunk) => acc + chunk),
						),
						proc.exitCode,
					],
					{ concurrency: 'unbounded' },
				);
				return { stdout, exitCode: Number(exitCode) } satisfies SessionListing;
			}).pipe(Effect.mapError(toScreenError(['-ls']))),
		);

		return {
			listSessions,

			createDetached: (name: string) => runCommand(['-d', '-m', '-S', name]),

			attach: (target: string) => runCommand(['-D', '-R', target], true),

			terminate: (target: string) => runCommand(['-X', '-S', target, 'quit']),

			wipe: (target: string) => runCommand(['-wipe', target]),

			detach: (target: string) => runCommand(['-D', target]),

			changeDirectory: (directory: string) => runCommand(['-X', 'chdir', directory]),
		};
	}),
}) {}
