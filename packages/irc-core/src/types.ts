export type CaseMapping = "ascii" | "rfc1459" | "rfc1459-strict";

/** `undefined` marks a valueless tag (`+typing`); `""` is an empty value (`key=`). */
export type IrcTags = ReadonlyMap<string, string | undefined>;

export type Prefix = {
  readonly nick: string;
  readonly user?: string;
  readonly host?: string;
};

export type IrcMessage = {
  readonly tags: IrcTags;
  readonly source?: Prefix;
  readonly command: string;
  readonly params: readonly string[];
};

export type IrcMessageInit = {
  tags?: IrcTags | Iterable<readonly [string, string | undefined]>;
  source?: Prefix;
  command: string;
  params?: readonly string[];
};

export type Cap = {
  readonly name: string;
  readonly value?: string;
};

export type Numeric = {
  readonly name: string;
  readonly code: string;
};

export type CommandArgument = {
  readonly name: string;
  readonly required: boolean;
};

export type CommandSpec = {
  readonly name: string;
  readonly args: readonly CommandArgument[];
};

export type LineDispatcherOptions = {
  logger?: (message: string) => void;
};
