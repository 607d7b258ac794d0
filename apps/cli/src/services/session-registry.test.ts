import { Effect, Layer } from 'effect';
import { describe, expect, it } from 'vitest';
import { ScreenError } from '../domain/errors.ts';
import { fakeScreen, listing, type FakeScreenOptions } from '../test/fakes.ts';
import { SessionRegistry } from './session-registry.ts';

function withRegistry(options: FakeScreenOptions) {
	const screen = fakeScreen(options);
	const layer = SessionRegistry.Default.pipe(Layer.provide(screen.layer));
	const list = () =>
		Effect.runPromise(
			SessionRegistry.pipe(
				Effect.flatMap((registry) => registry.list),
				Effect.provide(layer),
			),
		);
	return { screen, list };
}

describe('SessionRegistry.list', () => {
	it('parses the listing of a successful run', async () => {
		const { list } = withRegistry({
			listing: listing('\t100.work\t(Detached)', '\t200.play\t(Attached)'),
		});
		expect(await list()).toEqual([
			{ name: 'work', id: '100', status: 'detached' },
			{ name: 'play', id: '200', status: 'attached' },
		]);
	});

	it('reports no sessions when screen exits non-zero', async () => {
		const { list } = withRegistry({
			listing: { ...listing('\t100.work\t(Detached)'), exitCode: 1 },
		});
		expect(await list()).toEqual([]);
	});

	// A missing binary cannot be told apart from an empty listing.
	it('reports no sessions when screen cannot be run', async () => {
		const { list } = withRegistry({
			listing: new ScreenError({ message: 'spawn screen ENOENT', command: 'screen -ls' }),
		});
		expect(await list()).toEqual([]);
	});

	it('queries screen on every call', async () => {
		const { screen, list } = withRegistry({ listing: listing('\t100.work\t(Detached)') });
		await list();
		await list();
		expect(screen.listCount()).toBe(2);
	});
});
