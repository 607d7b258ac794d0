import { Deferred, Effect, Exit, Option, Queue, Scope } from 'effect';
import * as readline from 'node:readline';
import { InputInterrupted } from '../domain/errors.ts';

export type ConsoleStreams = {
	readonly input: NodeJS.ReadableStream;
	readonly output: NodeJS.WritableStream;
};

export type ConsoleShape = {
	readonly writeLine: (text: string) => Effect.Effect<void>;
	readonly readLine: (prompt: string) => Effect.Effect<string, InputInterrupted>;
};

/**
 * Line-oriented console over a pair of streams. The readline interface is
 * opened by the first read and stays open, paused between reads, until the
 * surrounding scope closes. End of input, Ctrl+D and Ctrl+C all close it, and
 * every read after that fails with `InputInterrupted`.
 */
export const makeConsoleIO = ({
	input,
	output,
}: ConsoleStreams): Effect.Effect<ConsoleShape, never, Scope.Scope> =>
	Effect.gen(function* () {
		const scope = yield* Effect.scope;
		const lines = yield* Queue.unbounded<string>();
		const closed = yield* Deferred.make<void>();

		const reader = yield* Effect.cached(
			Effect.acquireRelease(
				Effect.sync(() => {
					const rl = readline.createInterface({ input, output });
					rl.on('line', (line) => Queue.unsafeOffer(lines, line));
					rl.once('close', () => Deferred.unsafeDone(closed, Exit.void));
					rl.on('SIGINT', () => rl.close());
					return rl;
				}),
				(rl) => Effect.sync(() => rl.close()),
			).pipe(Scope.extend(scope)),
		);

		// Lines already read are handed out before the closed input is reported.
		const nextLine: Effect.Effect<string, InputInterrupted> = Effect.gen(function* () {
			const buffered = yield* Queue.poll(lines);
			if (Option.isSome(buffered)) return buffered.value;

			const line = yield* Effect.raceFirst(
				Queue.take(lines).pipe(Effect.map(Option.some)),
				Deferred.await(closed).pipe(Effect.zipRight(Queue.poll(lines))),
			);
			if (Option.isSome(line)) return line.value;
			return yield* Effect.fail(new InputInterrupted({ message: 'Input interrupted' }));
		});

		const writeLine = (text: string): Effect.Effect<void> =>
			Effect.sync(() => void output.write(`${text}\n`));

		const readLine = (prompt: string): Effect.Effect<string, InputInterrupted> =>
			Effect.gen(function* () {
				const rl = yield* reader;
				if (yield* Deferred.isDone(closed)) {
					output.write(prompt);
				} else {
					rl.setPrompt(prompt);
					rl.prompt();
				}
				return yield* nextLine.pipe(Effect.ensuring(Effect.sync(() => rl.pause())));
			});

		return { writeLine, readLine };
	});

export class ConsoleIO extends Effect.Service<ConsoleIO>()('ConsoleIO', {
	scoped: makeConsoleIO({ input: process.stdin, output: process.stdout }),
}) {}
