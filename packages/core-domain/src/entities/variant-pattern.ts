export type VariantKind =
  | 'numbered-prefix'
  | 'copy-suffix'
  | 'parenthesized-counter'
  | 'separator-digits'
  | 'catch-all';

export interface VariantPattern {
  kind: VariantKind;
  regex: RegExp;
  baseFilename: string;
}
