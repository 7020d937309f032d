import type { CaseMapping } from "../types";
import { foldCase } from "./caseMapping";

/**
 * Anchored glob match of a `nick!user@host` candidate against a ban-style
 * pattern. `*` matches any run, `?` exactly one character. Backtracks to the
 * most recent `*` on mismatch, so `*a*b` matches `xaxb`.
 */
export const matchesMask = (candidate: string, pattern: string, mapping: CaseMapping): boolean => {
  const text = Array.from(foldCase(candidate, mapping));
  const glob = Array.from(foldCase(pattern, mapping));

  let t = 0;
  let g = 0;
  let starAt = -1;
  let resumeAt = 0;

  while (t < text.length) {
    if (g < glob.length && (glob[g] === "?" || (glob[g] !== "*" && glob[g] === text[t]))) {
      t += 1;
      g += 1;
    } else if (g < glob.length && glob[g] === "*") {
      starAt = g;
      resumeAt = t;
      g += 1;
    } else if (starAt !== -1) {
      g = starAt + 1;
      resumeAt += 1;
      t = resumeAt;
    } else {
      return false;
    }
  }

  while (g < glob.length && glob[g] === "*") g += 1;
  return g === glob.length;
};

export const matchesAnyMask = (
  candidate: string,
  patterns: Iterable<string>,
  mapping: CaseMapping
): boolean => {
  for (const pattern of patterns) {
    if (matchesMask(candidate, pattern, mapping)) return true;
  }
  return false;
};
