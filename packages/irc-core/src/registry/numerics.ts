import type { Numeric } from "../types";
import numericTable from "./numerics.json";

const NUMERIC_COMMAND = /^[0-9]{3}$/;

export const numerics: readonly Numeric[] = Object.freeze(
  numericTable.map(({ name, code }) => Object.freeze({ name, code }))
);

const byCode = new Map(numerics.map((numeric) => [numeric.code, numeric]));
const byName = new Map(numerics.map((numeric) => [numeric.name, numeric]));

export const isNumericCommand = (command: string) => NUMERIC_COMMAND.test(command);

/** Accepts `1`, `"1"` or `"001"`. */
export const numericFromCode = (code: number | string): Numeric | undefined => {
  const padded = String(code).padStart(3, "0");
  return isNumericCommand(padded) ? byCode.get(padded) : undefined;
};

export const numericFromName = (name: string): Numeric | undefined => byName.get(name.toUpperCase());
