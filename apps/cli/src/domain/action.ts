import { Data, Option } from 'effect';

export type CliFlags = {
	name: Option.Option<string>;
	list: boolean;
	kill: boolean;
	killAll: boolean;
	directory: boolean;
	changeDirectory: Option.Option<string>;
	detach: boolean;
};

export type Action = Data.TaggedEnum<{
	Detach: {};
	ChangeDirectory: { readonly directory: Option.Option<string> };
	List: {};
	Kill: { readonly name: Option.Option<string> };
	KillAll: {};
	Connect: { readonly name: Option.Option<string> };
}>;

export const Action = Data.taggedEnum<Action>();

/** Flags are mutually exclusive; the first one set, in this order, wins. */
export function selectAction(flags: CliFlags): Action {
	if (flags.detach) return Action.Detach();
	if (Option.isSome(flags.changeDirectory)) {
		return Action.ChangeDirectory({ directory: flags.changeDirectory });
	}
	if (flags.directory) return Action.ChangeDirectory({ directory: Option.none() });
	if (flags.list) return Action.List();
	if (flags.kill) return Action.Kill({ name: flags.name });
	if (flags.killAll) return Action.KillAll();
	return Action.Connect({ name: flags.name });
}
