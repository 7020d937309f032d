import { SerializeError } from "../errors";
import type { IrcMessage, IrcTags, Prefix } from "../types";
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
import { formatPrefix } from "./message";
import { encodeTagValue } from "./tagCodec";

const LINE_BREAKING = /[\r\n\0]/;
const SOURCE_BREAKING = /[ \r\n\0]/;

const serializeTags = (tags: IrcTags) => {
  const entries: string[] = [];
  for (const [key, value] of tags) {
    if (!isValidTagKey(key)) {
      throw new SerializeError("InvalidTagKey", `Invalid tag key "${key}"`);
    }
    entries.push(value === undefined ? key : `${key}${TAG_VALUE_SEP}${encodeTagValue(value)}`);
  }
  return `${TAGS_SENTINEL}${entries.join(TAGS_SEP)}`;
};

const checkSource = (source: Prefix) => {
  const parts = [source.nick, source.user ?? "", source.host ?? ""];
  if (parts.some((part) => SOURCE_BREAKING.test(part))) {
    throw new SerializeError("InvalidSource", "Source cannot contain spaces or line breaks");
  }
  if (source.nick.includes(PREFIX_USER_SEP) || source.nick.includes(PREFIX_HOST_SEP)) {
    throw new SerializeError("InvalidSource", `Source nick "${source.nick}" cannot contain "!" or "@"`);
  }
  if (source.user?.includes(PREFIX_HOST_SEP)) {
    throw new SerializeError("InvalidSource", `Source user "${source.user}" cannot contain "@"`);
  }
  if (source.user === undefined && source.host?.includes(PREFIX_USER_SEP)) {
    throw new SerializeError("InvalidSource", `Source host "${source.host}" needs a user to contain "!"`);
  }
};

const serializeParams = (params: readonly string[]) => {
  if (params.length > MAX_PARAMS) {
    throw new SerializeError(
      "TooManyParameters",
      `A message carries at most ${MAX_PARAMS} parameters, got ${params.length}`
    );
  }

  return params.map((param, index) => {
    if (LINE_BREAKING.test(param)) {
      throw new SerializeError("InvalidParameter", `Parameter ${index} contains a line break or NUL`);
    }
    const needsTrailing =
      !param || param.includes(PARAM_SEP) || param.startsWith(TRAIL_SENTINEL);
    if (!needsTrailing) return param;
    if (index < params.length - 1) {
      throw new SerializeError(
        "InvalidParameter",
        `Only the last parameter may be empty, contain spaces or start with ":" (parameter ${index})`
      );
    }
    return `${TRAIL_SENTINEL}${param}`;
  });
};

export const serializeIrcMessage = (message: IrcMessage): string => {
  if (!isValidCommand(message.command)) {
    throw new SerializeError("InvalidCommand", `Invalid command "${message.command}"`);
  }

  const parts: string[] = [];
  if (message.tags.size > 0) {
    parts.push(serializeTags(message.tags));
  }
  if (message.source) {
    checkSource(message.source);
    parts.push(`${PREFIX_SENTINEL}${formatPrefix(message.source)}`);
  }
  parts.push(message.command, ...serializeParams(message.params));
  return parts.join(PARAM_SEP);
};
