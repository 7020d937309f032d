import { ParseError } from "../errors";
import type { IrcMessage, Prefix } from "../types";
import {
  MAX_PARAMS,
  PARAM_SEP,
  PREFIX_HOST_SEP,
  PREFIX_SENTINEL,
  PREFIX_USER_SEP,
  TAGS_SENTINEL,
  TAGS_SEP,
  TAG_VALUE_SEP,
  TRAIL_SENTINEL,
  isValidCommand,
  isValidTagKey
} from "./grammar";
import { createIrcMessage } from "./message";
import { decodeTagValue } from "./tagCodec";

const skipSpaces = (line: string, cursor: number) => {
  while (line[cursor] === PARAM_SEP) cursor += 1;
  return cursor;
};

const nextSpace = (line: string, cursor: number) => {
  const index = line.indexOf(PARAM_SEP, cursor);
  return index === -1 ? line.length : index;
};

/**
 * Parses the tag segment without its leading `@`. A repeated key keeps its
 * first position and takes the last value.
 */
export const parseTags = (raw: string, line = raw): Map<string, string | undefined> => {
  const tags = new Map<string, string | undefined>();
  for (const entry of raw.split(TAGS_SEP)) {
    if (!entry) continue;
    const sepIndex = entry.indexOf(TAG_VALUE_SEP);
    const key = sepIndex === -1 ? entry : entry.slice(0, sepIndex);
    if (!isValidTagKey(key)) {
      throw new ParseError("MalformedTags", `Invalid tag key "${key}"`, line);
    }
    tags.set(key, sepIndex === -1 ? undefined : decodeTagValue(entry.slice(sepIndex + 1)));
  }
  return tags;
};

/** Best-effort `nick!user@host` split; never fails. */
export const parsePrefix = (raw: string): Prefix => {
  const userIndex = raw.indexOf(PREFIX_USER_SEP);
  const hostIndex = raw.indexOf(PREFIX_HOST_SEP, userIndex === -1 ? 0 : userIndex + 1);
  const nickEnd = userIndex !== -1 ? userIndex : hostIndex !== -1 ? hostIndex : raw.length;
  const nick = raw.slice(0, nickEnd);
  const user =
    userIndex === -1 ? undefined : raw.slice(userIndex + 1, hostIndex === -1 ? raw.length : hostIndex);
  const host = hostIndex === -1 ? undefined : raw.slice(hostIndex + 1);
  return {
    nick,
    ...(user !== undefined ? { user } : {}),
    ...(host !== undefined ? { host } : {})
  };
};

export const parseIrcMessage = (line: string): IrcMessage => {
  if (!line) {
    throw new ParseError("EmptyLine", "Cannot parse an empty line", line);
  }

  let cursor = 0;
  let tags = new Map<string, string | undefined>();
  let source: Prefix | undefined;

  if (line.startsWith(TAGS_SENTINEL)) {
    const end = nextSpace(line, cursor);
    tags = parseTags(line.slice(cursor + 1, end), line);
    cursor = skipSpaces(line, end);
  }

  if (line.startsWith(PREFIX_SENTINEL, cursor)) {
    const end = nextSpace(line, cursor);
    source = parsePrefix(line.slice(cursor + 1, end));
    cursor = skipSpaces(line, end);
  }

  const commandEnd = nextSpace(line, cursor);
  const command = line.slice(cursor, commandEnd);
  if (!isValidCommand(command)) {
    throw new ParseError(
      "MissingCommand",
      command ? `Invalid command "${command}"` : "Line has no command",
      line
    );
  }
  cursor = commandEnd;

  const params: string[] = [];
  while (cursor < line.length) {
    cursor = skipSpaces(line, cursor);
    if (cursor >= line.length) break;

    // Only 15 tokens are distinguishable, so the last slot takes everything left.
    if (line.startsWith(TRAIL_SENTINEL, cursor) || params.length === MAX_PARAMS - 1) {
      const rest = line.slice(cursor);
      params.push(rest.startsWith(TRAIL_SENTINEL) ? rest.slice(1) : rest);
      break;
    }

    const end = nextSpace(line, cursor);
    params.push(line.slice(cursor, end));
    cursor = end;
  }

  return createIrcMessage({ tags, source, command, params });
};

export const tryParseIrcMessage = (line: string): IrcMessage | null => {
  try {
    return parseIrcMessage(line);
  } catch (error) {
    if (error instanceof ParseError) return null;
    throw error;
  }
};
