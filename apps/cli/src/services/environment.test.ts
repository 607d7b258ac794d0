import { ConfigProvider, Effect, Option } from 'effect';
import { describe, expect, it } from 'vitest';
import { SessionEnvironment } from './environment.ts';

const withEnv = <A, E>(
	vars: Record<string, string>,
	f: (env: SessionEnvironment) => Effect.Effect<A, E>,
) =>
	Effect.runPromise(
		SessionEnvironment.pipe(
			Effect.flatMap(f),
			Effect.provide(SessionEnvironment.Default),
			Effect.withConfigProvider(ConfigProvider.fromMap(new Map(Object.entries(vars)))),
		),
	);

describe('SessionEnvironment', () => {
	it('reads the current session from STY', async () => {
		const env = await withEnv({ STY: '4242.pts-0.host', PWD: '/home/tester' }, Effect.succeed);
		expect(env.inSession).toBe(true);
		expect(env.currentSession).toEqual(
			Option.some({ name: 'pts-0.host', id: '4242', status: 'attached' }),
		);
		expect(env.workingDirectory).toEqual(Option.some('/home/tester'));
	});

	it('is outside a session without STY', async () => {
		const env = await withEnv({}, Effect.succeed);
		expect(env.inSession).toBe(false);
		expect(Option.isNone(env.currentSession)).toBe(true);
		expect(Option.isNone(env.workingDirectory)).toBe(true);
	});

	it('treats an empty STY as no session', async () => {
		const env = await withEnv({ STY: '' }, Effect.succeed);
		expect(env.inSession).toBe(false);
	});

	it('fails to require a session outside of one', async () => {
		const error = await withEnv({}, (env) => Effect.flip(env.requireCurrentSession));
		expect(error).toMatchObject({ _tag: 'NoConnectedSession', message: 'Not in screen session' });
	});
});
