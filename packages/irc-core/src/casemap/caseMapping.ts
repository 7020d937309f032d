import type { CaseMapping } from "../types";

const RFC1459_STRICT_FOLDS: Record<string, string> = {
  "[": "{",
  "]": "}",
  "\\": "|"
};

const RFC1459_FOLDS: Record<string, string> = {
  ...RFC1459_STRICT_FOLDS,
  "~": "^"
};

const EXTRA_FOLDS: Record<CaseMapping, Record<string, string>> = {
  ascii: {},
  rfc1459: RFC1459_FOLDS,
  "rfc1459-strict": RFC1459_STRICT_FOLDS
};

const ISUPPORT_NAMES: Record<string, CaseMapping> = {
  ascii: "ascii",
  rfc1459: "rfc1459",
  "rfc1459-strict": "rfc1459-strict",
  "strict-rfc1459": "rfc1459-strict"
};

/** Only ASCII letters and the mapping's punctuation change; everything else is kept. */
export const foldCase = (text: string, mapping: CaseMapping): string => {
  const extra = EXTRA_FOLDS[mapping];
  let folded = "";
  for (const char of text) {
    if (char >= "A" && char <= "Z") {
      folded += String.fromCharCode(char.charCodeAt(0) + 32);
    } else {
      folded += extra[char] ?? char;
    }
  }
  return folded;
};

export const caseEquals = (a: string, b: string, mapping: CaseMapping): boolean =>
  foldCase(a, mapping) === foldCase(b, mapping);

/** Maps a `CASEMAPPING` ISUPPORT value; unsupported mappings give `undefined`. */
export const parseCaseMapping = (token: string): CaseMapping | undefined =>
  Object.hasOwn(ISUPPORT_NAMES, token.toLowerCase()) ? ISUPPORT_NAMES[token.toLowerCase()] : undefined;

/**
 * Map keyed by nicknames or channel names. Keys are compared folded; iteration
 * yields the spelling the key was first stored with.
 */
export class CaseMappedMap<V> {
  private readonly entries = new Map<string, { key: string; value: V }>();
  private readonly mapping: CaseMapping;

  constructor(mapping: CaseMapping, entries?: Iterable<readonly [string, V]>) {
    this.mapping = mapping;
    for (const [key, value] of entries ?? []) {
      this.set(key, value);
    }
  }

  get size() {
    return this.entries.size;
  }

  get(key: string): V | undefined {
    return this.entries.get(foldCase(key, this.mapping))?.value;
  }

  has(key: string) {
    return this.entries.has(foldCase(key, this.mapping));
  }

  set(key: string, value: V) {
    const folded = foldCase(key, this.mapping);
    const existing = this.entries.get(folded);
    this.entries.set(folded, { key: existing?.key ?? key, value });
    return this;
  }

  delete(key: string) {
    return this.entries.delete(foldCase(key, this.mapping));
  }

  /**
   * Re-keys an entry after a NICK change, keeping its value. Returns false when
   * `from` is unknown or `to` already belongs to another entry.
   */
  rename(from: string, to: string) {
    const foldedFrom = foldCase(from, this.mapping);
    const foldedTo = foldCase(to, this.mapping);
    const entry = this.entries.get(foldedFrom);
    if (!entry) return false;
    if (foldedTo !== foldedFrom && this.entries.has(foldedTo)) return false;
    this.entries.delete(foldedFrom);
    this.entries.set(foldedTo, { key: to, value: entry.value });
    return true;
  }

  *[Symbol.iterator](): IterableIterator<[string, V]> {
    for (const { key, value } of this.entries.values()) {
      yield [key, value];
    }
  }

  keys(): string[] {
    return Array.from(this, ([key]) => key);
  }
}
