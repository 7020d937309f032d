import type { Cap } from "../types";

const CAP_SEP = " ";
const CAP_VALUE_SEP = "=";

export const parseCap = (text: string): Cap => {
  const sepIndex = text.indexOf(CAP_VALUE_SEP);
  if (sepIndex === -1) return { name: text };
  const value = text.slice(sepIndex + 1);
  return value ? { name: text.slice(0, sepIndex), value } : { name: text.slice(0, sepIndex) };
};

export const formatCap = (cap: Cap): string =>
  cap.value ? `${cap.name}${CAP_VALUE_SEP}${cap.value}` : cap.name;

/**
 * Parses the capability list of a `CAP LS`/`ACK`/`NAK` reply. Some networks
 * pad the list with a trailing space.
 */
export const parseCapList = (text: string): Cap[] => {
  const list = text.startsWith(":") ? text.slice(1) : text;
  return list
    .trim()
    .split(CAP_SEP)
    .filter(Boolean)
    .map(parseCap);
};

export const formatCapList = (caps: readonly Cap[]): string => caps.map(formatCap).join(CAP_SEP);
