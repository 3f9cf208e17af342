import { hintAlignment, hintBirthplace, hintCode, hintHeight, hintTendency } from "./hint";
import { Comparison, Hint, Sinner } from "./types";

const ANSI = {
  reset: "\x1b[0m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
};

type Color = "green" | "yellow" | "red";

export function colorEnabled(): boolean {
  return !process.env.NO_COLOR && process.stdout.isTTY === true;
}

export function paint(text: string, color: Color, enabled = colorEnabled()): string {
  return enabled ? `${ANSI[color]}${text}${ANSI.reset}` : text;
}

const GLYPHS: Record<Comparison, string> = {
  [Comparison.Correct]: " =",
  [Comparison.FarLess]: "↓↓",
  [Comparison.Less]: " ↓",
  [Comparison.Near]: " ≅",
  [Comparison.Greater]: " ↑",
  [Comparison.FarGreater]: "↑↑",
};

export function formatComparison(c: Comparison, color = colorEnabled()): string {
  const tint: Color = c === Comparison.Correct ? "green" : c === Comparison.Near ? "yellow" : "red";
  return paint(GLYPHS[c], tint, color);
}

function formatBool(b: boolean, color: boolean): string {
  return b ? paint(" 1", "green", color) : paint(" 0", "red", color);
}

/** One row as the game draws it: code, alignment, tendency, height, birthplace. */
export function formatHint(h: Hint, color = colorEnabled()): string {
  const code = hintCode(h);
  return [
    code === undefined ? paint(" x", "red", color) : formatComparison(code, color),
    formatBool(hintAlignment(h), color),
    formatBool(hintTendency(h), color),
    formatComparison(hintHeight(h), color),
    formatBool(hintBirthplace(h), color),
  ].join(" ");
}

export function formatSinnerInfo(s: Sinner): string {
  return [
    `Name: ${s.name}`,
    `Code: ${s.code === undefined ? "NOX" : s.code}`,
    `Alignment: ${s.alignment}`,
    `Tendency: ${s.tendency}`,
    `Height: ${s.height}cm`,
    `Birthplace: ${s.birthplace}`,
  ].join("\n");
}
