import { Args, Command, Options } from '@effect/cli';
import { NodeContext, NodeRuntime } from '@effect/platform-node';
import * as Effect from 'effect/Effect';
import * as Layer from 'effect/Layer';
import pkg from '../package.json' with { type: 'json' };
import { AppConfig } from '../src/services/config.ts';
import { ConsoleIO } from '../src/services/console-io.ts';
import { SessionEnvironment } from '../src/services/environment.ts';
import { ScreenClient } from '../src/services/screen-client.ts';
import { SessionController } from '../src/services/session-controller.ts';
import { SessionRegistry } from '../src/services/session-registry.ts';
import { App } from '../src/ui/app.ts';
import { SelectionPrompt } from '../src/ui/selection-prompt.ts';

const ScreenLayer = ScreenClient.Default.pipe(Layer.provideMerge(AppConfig.Default));

const AppLayer = Layer.mergeAll(
	SessionRegistry.Default,
	SessionController.Default,
	SelectionPrompt.Default,
).pipe(
	Layer.provideMerge(ScreenLayer),
	Layer.provideMerge(ConsoleIO.Default),
	Layer.provideMerge(SessionEnvironment.Default),
);

const name = Args.text({ name: 'name' }).pipe(
	Args.withDescription('the name of the screen session'),
	Args.optional,
);
const list = Options.boolean('list').pipe(
	Options.withAlias('l'),
	Options.withDescription('list all open sessions'),
);
const kill = Options.boolean('kill').pipe(
	Options.withAlias('k'),
	Options.withDescription('kill a session'),
);
const killAll = Options.boolean('kill-all').pipe(
	Options.withAlias('K'),
	Options.withDescription('kill all sessions'),
);
const directory = Options.boolean('directory').pipe(
	Options.withAlias('d'),
	Options.withDescription('set the current directory as the session directory'),
);
const changeDirectory = Options.text('change-directory').pipe(
	Options.withAlias('c'),
	Options.withDescription('set the session directory to the given path'),
	Options.optional,
);
const detach = Options.boolean('detach').pipe(
	Options.withAlias('x'),
	Options.withDescription('detach from the current session'),
);

const scrnCmd = Command.make(
	'scrn',
	{ name, list, kill, killAll, directory, changeDirectory, detach },
	(flags) => App(flags).pipe(Effect.provide(AppLayer)),
);

export const cli = Command.run(scrnCmd, {
	name: 'scrn',
	version: pkg.version,
});

cli(process.argv).pipe(Effect.provide(NodeContext.layer), NodeRuntime.runMain);
