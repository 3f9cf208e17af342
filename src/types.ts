export const ALIGNMENTS = [
  "Death",
  "Fraud",
  "Limbo",
  "Anger",
  "Love",
  "Greed",
  "Heresy",
  "Sloth",
  "Pestilence",
  "Immortal",
  "Famine",
  "Violence",
  "Treachery",
] as const;
export const TENDENCIES = ["Catalyst", "Arcane", "Endura", "Fury", "Reticle", "Umbra"] as const;
export const BIRTHPLACES = ["Other", "Syndicate", "Eastside"] as const;

export type Alignment = (typeof ALIGNMENTS)[number];
export type Tendency = (typeof TENDENCIES)[number];
export type Birthplace = (typeof BIRTHPLACES)[number];

export type Sinner = {
  readonly name: string;
  readonly code?: number; // 0..65535, absent only for NOX
  readonly alignment: Alignment;
  readonly tendency: Tendency;
  readonly height: number; // cm, 1..255
  readonly birthplace: Birthplace;
};

// Ordinal values double as the 3-bit encodings in a packed hint.
export enum Comparison {
  Correct = 0,
  FarLess = 1,
  Less = 2,
  Near = 3,
  Greater = 4,
  FarGreater = 5,
}

export const COMPARISONS: readonly Comparison[] = [
  Comparison.Correct,
  Comparison.FarLess,
  Comparison.Less,
  Comparison.Near,
  Comparison.Greater,
  Comparison.FarGreater,
];

/**
 * Near/far half-widths in twentieths of a unit, so that every band edge of
 * the game's decimal constants is an integer.
 */
export type Threshold = {
  near: number;
  far: number;
};

export type HintFields = {
  code?: Comparison;
  alignment: boolean;
  tendency: boolean;
  height: Comparison;
  birthplace: boolean;
};

export type Hint = number; // packed, see hint.ts

export type NameAndHint = {
  name: string;
  hint: Hint;
};

export function sameSinner(a: Sinner, b: Sinner): boolean {
  return (
    a.name === b.name &&
    a.code === b.code &&
    a.alignment === b.alignment &&
    a.tendency === b.tendency &&
    a.height === b.height &&
    a.birthplace === b.birthplace
  );
}
