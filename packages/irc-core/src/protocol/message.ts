import type { IrcMessage, IrcMessageInit, IrcTags, Prefix } from "../types";
import { PREFIX_HOST_SEP, PREFIX_USER_SEP } from "./grammar";

const freezePrefix = (prefix: Prefix): Prefix => {
  const { nick, user, host } = prefix;
  return Object.freeze({
    nick,
    ...(user !== undefined ? { user } : {}),
    ...(host !== undefined ? { host } : {})
  });
};

/** Read-only view over a private copy; it has no `set`, `delete` or `clear`. */
class FrozenTags implements ReadonlyMap<string, string | undefined> {
  readonly #tags: Map<string, string | undefined>;

  constructor(entries: IrcMessageInit["tags"]) {
    this.#tags = new Map<string, string | undefined>(entries ?? []);
    Object.freeze(this);
  }

  get size() {
    return this.#tags.size;
  }

  get(key: string) {
    return this.#tags.get(key);
  }

  has(key: string) {
    return this.#tags.has(key);
  }

  forEach(
    callback: (value: string | undefined, key: string, map: ReadonlyMap<string, string | undefined>) => void,
    thisArg?: unknown
  ) {
    this.#tags.forEach((value, key) => callback.call(thisArg, value, key, this));
  }

  entries() {
    return this.#tags.entries();
  }

  keys() {
    return this.#tags.keys();
  }

  values() {
    return this.#tags.values();
  }

  [Symbol.iterator]() {
    return this.#tags.entries();
  }
}

/**
 * Builds a frozen message. Tags are copied, so later changes to the caller's
 * map do not leak into the message.
 */
export const createIrcMessage = (init: IrcMessageInit): IrcMessage => {
  const tags: IrcTags = new FrozenTags(init.tags);
  const params = Object.freeze([...(init.params ?? [])]);
  return Object.freeze({
    tags,
    ...(init.source ? { source: freezePrefix(init.source) } : {}),
    command: init.command,
    params
  });
};

/** Returns a new message; pass `source: undefined` to drop the prefix. */
export const updateIrcMessage = (
  message: IrcMessage,
  changes: Partial<IrcMessageInit>
): IrcMessage =>
  createIrcMessage({
    tags: "tags" in changes ? changes.tags : message.tags,
    source: "source" in changes ? changes.source : message.source,
    command: changes.command ?? message.command,
    params: changes.params ?? message.params
  });

export const formatPrefix = (prefix: Prefix): string => {
  let mask = prefix.nick;
  if (prefix.user !== undefined) mask += `${PREFIX_USER_SEP}${prefix.user}`;
  if (prefix.host !== undefined) mask += `${PREFIX_HOST_SEP}${prefix.host}`;
  return mask;
};

export const prefixesEqual = (a: Prefix | undefined, b: Prefix | undefined): boolean => {
  if (!a || !b) return a === b;
  return a.nick === b.nick && a.user === b.user && a.host === b.host;
};

const tagsEqual = (a: IrcTags, b: IrcTags) => {
  if (a.size !== b.size) return false;
  for (const [key, value] of a) {
    if (!b.has(key) || b.get(key) !== value) return false;
  }
  return true;
};

/** Tag order is ignored; parameter order is not. */
export const ircMessagesEqual = (a: IrcMessage, b: IrcMessage): boolean =>
  a.command === b.command &&
  prefixesEqual(a.source, b.source) &&
  tagsEqual(a.tags, b.tags) &&
  a.params.length === b.params.length &&
  a.params.every((param, index) => param === b.params[index]);
