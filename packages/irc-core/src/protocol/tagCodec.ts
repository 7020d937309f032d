const ESCAPES: Record<string, string> = {
  ";": "\\:",
  " ": "\\s",
  "\\": "\\\\",
  "\r": "\\r",
  "\n": "\\n"
};

const UNESCAPES: Record<string, string> = {
  ":": ";",
  s: " ",
  "\\": "\\",
  r: "\r",
  n: "\n"
};

export const encodeTagValue = (raw: string): string => {
  let escaped = "";
  for (const char of raw) {
    escaped += ESCAPES[char] ?? char;
  }
  return escaped;
};

/**
 * Unknown escapes keep the escaped character and lose the backslash; a lone
 * trailing backslash is dropped.
 */
export const decodeTagValue = (escaped: string): string => {
  let value = "";
  let pendingEscape = false;
  for (const char of escaped) {
    if (pendingEscape) {
      value += UNESCAPES[char] ?? char;
      pendingEscape = false;
    } else if (char === "\\") {
      pendingEscape = true;
    } else {
      value += char;
    }
  }
  return value;
};
