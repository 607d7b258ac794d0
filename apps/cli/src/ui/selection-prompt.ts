import { Effect, Option } from 'effect';
import { SelectionError } from '../domain/errors.ts';
import type { ScreenSession } from '../domain/session.ts';
import { ConsoleIO } from '../services/console-io.ts';
import { formatSelectionList } from './session-list.ts';

const INTEGER = /^[+-]?\d+$/;

export function parseSelection(
	input: string,
	count: number,
): Effect.Effect<number, SelectionError> {
	const trimmed = input.trim();
	if (!INTEGER.test(trimmed)) {
		return Effect.fail(
			new SelectionError({ message: 'Selection not recognised', reason: 'Unrecognised', count }),
		);
	}
	const selection = Number.parseInt(trimmed, 10);
	if (selection < 1 || selection > count) {
		return Effect.fail(
			new SelectionError({ message: 'Selection out of range', reason: 'OutOfRange', count }),
		);
	}
	return Effect.succeed(selection - 1);
}

export class SelectionPrompt extends Effect.Service<SelectionPrompt>()('SelectionPrompt', {
	effect: Effect.gen(function* () {
		const io = yield* ConsoleIO;

		/**
		 * Asks the user to pick one of `sessions`. With fewer than two there is
		 * nothing to choose and no prompt is shown.
		 */
		const select = (
			message: string,
			sessions: ReadonlyArray<ScreenSession>,
		): Effect.Effect<Option.Option<ScreenSession>, SelectionError> =>
			Effect.gen(function* () {
				if (sessions.length < 2) return Option.fromNullable(sessions[0]);

				yield* io.writeLine(message);
				for (const line of formatSelectionList(sessions)) {
					yield* io.writeLine(line);
				}

				const input = yield* io.readLine('#: ').pipe(
					Effect.mapError(
						(error) =>
							new SelectionError({
								message: error.message,
								reason: 'Interrupted',
								count: sessions.length,
							}),
					),
				);
				const index = yield* parseSelection(input, sessions.length);
				return Option.fromNullable(sessions[index]);
			});

		/** Yes/no question; anything but an answer starting with `y` is a no. */
		const confirm = (question: string): Effect.Effect<boolean> =>
			io.writeLine(question).pipe(
				Effect.zipRight(io.readLine('(y/n): ')),
				Effect.map((answer) => answer.charAt(0).toLowerCase() === 'y'),
				Effect.orElseSucceed(() => false),
			);

		return { select, confirm };
	}),
}) {}
