export const TAGS_SENTINEL = "@";
export const TAGS_SEP = ";";
export const TAG_VALUE_SEP = "=";
export const PREFIX_SENTINEL = ":";
export const PREFIX_USER_SEP = "!";
export const PREFIX_HOST_SEP = "@";
export const PARAM_SEP = " ";
export const TRAIL_SENTINEL = ":";

/** Command plus params may not exceed 15 tokens on the wire. */
export const MAX_PARAMS = 14;

const COMMAND_PATTERN = /^(?:[A-Za-z]+|[0-9]{3})$/;
const TAG_KEY_PATTERN = /^\+?(?:[A-Za-z0-9.-]+\/)?[A-Za-z0-9-]+$/;

export const isValidCommand = (command: string) => COMMAND_PATTERN.test(command);

export const isValidTagKey = (key: string) => TAG_KEY_PATTERN.test(key);
