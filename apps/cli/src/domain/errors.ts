import { Data } from 'effect';
import type { ScreenSession } from './session.ts';

export class InvalidName extends Data.TaggedError('InvalidName')<{
	message: string;
	sessionName: string;
}> {}

export type SelectionFailure = 'OutOfRange' | 'Unrecognised' | 'Interrupted';

export class SelectionError extends Data.TaggedError('SelectionError')<{
	message: string;
	reason: SelectionFailure;
	count: number;
}> {}

export class SessionUnreachable extends Data.TaggedError('SessionUnreachable')<{
	message: string;
	session: ScreenSession;
}> {}

export class ConnectionFailed extends Data.TaggedError('ConnectionFailed')<{
	message: string;
	session: ScreenSession;
}> {}

export class NoConnectedSession extends Data.TaggedError('NoConnectedSession')<{
	message: string;
}> {}

export class DirectoryError extends Data.TaggedError('DirectoryError')<{
	message: string;
	path?: string;
}> {}

export class ScreenError extends Data.TaggedError('ScreenError')<{
	message: string;
	command: string;
}> {}

export class InputInterrupted extends Data.TaggedError('InputInterrupted')<{
	message: string;
}> {}

/** Errors rendered to the user as a single `Error: <message>` line. */
export type ActionError =
	| InvalidName
	| SelectionError
	| SessionUnreachable
	| ConnectionFailed
	| NoConnectedSession
	| DirectoryError
	| ScreenError;
