import { FileSystem, Path } from '@effect/platform';
import { Effect, Option, Schema } from 'effect';
import { homedir } from 'os';

const DEFAULT_SESSION_NAME = 'main';
const DEFAULT_BINARY = 'screen';

const ConfigFile = Schema.Struct({
	defaultSessionName: Schema.optional(Schema.NonEmptyString),
	binary: Schema.optional(Schema.NonEmptyString),
});

type ConfigFile = typeof ConfigFile.Type;

const decodeConfigFile = Schema.decodeUnknownOption(Schema.parseJson(ConfigFile));

export function configFilePath(path: Path.Path) {
	return path.join(homedir(), '.config', 'scrn', 'config.json');
}

/** Reads the config file; anything missing or malformed falls back to the defaults. */
export function loadConfigFile(file: string) {
	return Effect.gen(function* () {
		const fs = yield* FileSystem.FileSystem;

		const raw = yield* fs.readFileString(file).pipe(Effect.option);

		if (Option.isNone(raw)) return {} satisfies ConfigFile;

		const parsed = decodeConfigFile(raw.value);
		if (Option.isNone(parsed)) {
			yield* Effect.logWarning(`Ignoring malformed config file ${file}`);
			return {} satisfies ConfigFile;
		}
		return parsed.value;
	});
}

export class AppConfig extends Effect.Service<AppConfig>()('AppConfig', {
	effect: Effect.gen(function* () {
		const path = yield* Path.Path;
		const config: ConfigFile = yield* loadConfigFile(configFilePath(path));

		const defaultSessionName = config.defaultSessionName ?? DEFAULT_SESSION_NAME;
		const binary = config.binary ?? DEFAULT_BINARY;

		return { defaultSessionName, binary };
	}),
}) {}
