import type { CommandArgument, CommandSpec } from "../types";

export const parseCommandArgument = (text: string): CommandArgument => {
  const name = text.slice(1, -1);
  const brackets = `${text.slice(0, 1)}${text.slice(-1)}`;
  if (text.length > 2 && brackets === "<>") return { name, required: true };
  if (text.length > 2 && brackets === "[]") return { name, required: false };
  throw new Error(`Unable to parse argument: ${text}`);
};

const defineCommand = (name: string, args: string): CommandSpec => ({
  name,
  args: args.split(" ").map(parseCommandArgument)
});

/** Commands a client sends to the server. */
export const clientCommands: readonly CommandSpec[] = [
  defineCommand("PRIVMSG", "<target> <content>"),
  defineCommand("NOTICE", "<target> <content>"),
  defineCommand("JOIN", "<channel> [key]")
];

const byName = new Map(clientCommands.map((spec) => [spec.name, spec]));

/** Command names are ASCII-only, so lookup ignores case without a casemapping. */
export const lookupCommand = (name: string): CommandSpec | undefined => byName.get(name.toUpperCase());

export const requiredArgCount = (spec: CommandSpec): number =>
  spec.args.filter((arg) => arg.required).length;
