import type { BaseFileSpec, VariantKind, VariantPattern } from "@file-versioner/core-domain";
import { splitFilename } from "./version-naming";

function escapeRegExp(input: string): string {
  return input.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

type PatternSource = (name: string, ext: string) => string;

// Precedence order: the first matching kind decides.
const VARIANT_SOURCES: ReadonlyArray<[VariantKind, PatternSource]> = [
  // browser downloads: (1)invoice.pdf
  ["numbered-prefix", (name, ext) => `\\(\\d+\\)${name}${ext}`],
  // invoice copy.pdf, invoice_copy2.pdf, invoice-copy.pdf
  ["copy-suffix", (name, ext) => `${name}[ _-]copy\\d*${ext}`],
  // invoice (3).pdf
  ["parenthesized-counter", (name, ext) => `${name} \\(\\d+\\)${ext}`],
  // invoice_7.pdf, invoice-7.pdf, invoice 7.pdf
  ["separator-digits", (name, ext) => `${name}[ _-]\\d+${ext}`],
  ["catch-all", (name, ext) => `.*${name}.*${ext}`],
];

export function compileBaseFilePatterns(baseFilename: string): VariantPattern[] {
  const { name, ext } = splitFilename(baseFilename);
  const n = escapeRegExp(name);
  const e = escapeRegExp(ext);

  return VARIANT_SOURCES.map(([kind, source]) => ({
    kind,
    regex: new RegExp(`^${source(n, e)}$`),
    baseFilename,
  }));
}

/**
 * Builds the ordered matcher list for one folder. Patterns keep configuration
 * order, so on overlapping names the first configured base file wins.
 */
export function compileVariantPatterns(specs: readonly BaseFileSpec[]): VariantPattern[] {
  return specs.flatMap((spec) => compileBaseFilePatterns(spec.name));
}

export function findVariantPattern(
  patterns: readonly VariantPattern[],
  filename: string
): VariantPattern | undefined {
  return patterns.find((p) => p.regex.test(filename) && p.baseFilename !== filename);
}
