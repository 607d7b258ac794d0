import { Effect, Layer } from 'effect';
import { InputInterrupted, ScreenError } from '../domain/errors.ts';
import { ConsoleIO } from '../services/console-io.ts';
import { ScreenClient, type SessionListing } from '../services/screen-client.ts';

export type ScreenOp = 'create' | 'attach' | 'terminate' | 'wipe' | 'detach' | 'chdir';

export type ScreenCall = { op: ScreenOp; target: string };

export type FakeScreenOptions = {
	listing?: SessionListing | ScreenError;
	/** Operations that fail with a ScreenError instead of succeeding. */
	failing?: ReadonlyArray<ScreenOp>;
};

export function fakeScreen(options: FakeScreenOptions = {}) {
	const calls: Array<ScreenCall> = [];
	const result = options.listing ?? { stdout: '', exitCode: 1 };
	let listCount = 0;

	const record = (op: ScreenOp, target: string): Effect.Effect<void, ScreenError> =>
		Effect.suspend(() => {
			calls.push({ op, target });
			if (options.failing?.includes(op)) {
				return Effect.fail(
					new ScreenError({ message: `${op} failed`, command: `screen ${op} ${target}` }),
				);
			}
			return Effect.void;
		});

	const listSessions: Effect.Effect<SessionListing, ScreenError> = Effect.suspend(() => {
		listCount++;
		return result instanceof ScreenError ? Effect.fail(result) : Effect.succeed(result);
	});

	const client = new ScreenClient({
		listSessions,
		createDetached: (name: string) => record('create', name),
		attach: (target: string) => record('attach', target),
		terminate: (target: string) => record('terminate', target),
		wipe: (target: string) => record('wipe', target),
		detach: (target: string) => record('detach', target),
		changeDirectory: (directory: string) => record('chdir', directory),
	});

	return {
		calls,
		listCount: () => listCount,
		layer: Layer.succeed(ScreenClient, client),
	};
}

export const INTERRUPT = Symbol('interrupt');

/** Console that answers reads from `inputs` in order and records every line written. */
export function fakeConsole(inputs: ReadonlyArray<string | typeof INTERRUPT> = []) {
	const output: Array<string> = [];
	const prompts: Array<string> = [];
	const pending = [...inputs];

	const io = new ConsoleIO({
		writeLine: (text: string) => Effect.sync(() => void output.push(text)),
		readLine: (prompt: string) =>
			Effect.suspend(() => {
				prompts.push(prompt);
				const next = pending.shift();
				if (next === undefined || next === INTERRUPT) {
					return Effect.fail(new InputInterrupted({ message: 'Input interrupted' }));
				}
				return Effect.succeed(next);
			}),
	});

	return { output, prompts, layer: Layer.succeed(ConsoleIO, io) };
}

export function listing(...lines: Array<string>): SessionListing {
	return {
		stdout: [
			'There are screens on:',
			...lines,
			`${lines.length} Sockets in /run/screen/S-tester.`,
			'',
		].join('\n'),
		exitCode: 0,
	};
}
