import chalk, { type ChalkInstance } from "chalk";

// ── Perch palette ─────────────────────────────────────────────────
const TEAL = [38, 198, 176] as const;

export interface Theme {
  primaryBold: ChalkInstance;
  dim: ChalkInstance;
  bold: ChalkInstance;
  err: ChalkInstance;
  warn: ChalkInstance;
}

const teal = chalk.rgb(...TEAL);

export const theme: Theme = {
  primaryBold: teal.bold,
  dim: chalk.dim,
  bold: chalk.bold,
  err: chalk.red,
  warn: chalk.yellow,
};
