import { DEFAULT_QUERY, EmptyQueryError, InvalidQueryError, codePointLength, sliceCodePoints } from "@clia/shared";

export interface QuerySources {
  positional?: string;
  stdin?: string;
  attachment?: string;
  lastCapture?: string;
}

export type SourceName = keyof QuerySources;

/** Carries only the sources the winning rule used. */
export interface Query extends QuerySources {
  effectiveText: string;
  /** Number of the precedence rule that produced `effectiveText`. */
  rule: number;
}

export interface CompositionRule {
  rule: number;
  /** Sources that must all be present for the rule to apply. */
  requires: readonly SourceName[];
  /** Sources joined, in order, into the effective text. */
  uses: readonly SourceName[];
}

/**
 * Evaluated top to bottom; the first rule whose sources are all present wins.
 * Rule 9 drops stdin (and any capture) when a query and an attachment are
 * both given.
 */
export const PRECEDENCE_RULES: readonly CompositionRule[] = [
  { rule: 9, requires: ["positional", "stdin", "attachment"], uses: ["positional", "attachment"] },
  { rule: 8, requires: ["positional", "attachment", "lastCapture"], uses: ["positional", "attachment", "lastCapture"] },
  { rule: 7, requires: ["positional", "lastCapture"], uses: ["positional", "lastCapture"] },
  { rule: 6, requires: ["positional", "attachment"], uses: ["positional", "attachment"] },
  { rule: 5, requires: ["stdin", "attachment"], uses: ["stdin", "attachment"] },
  { rule: 4, requires: ["stdin", "positional"], uses: ["positional", "stdin"] },
  { rule: 1, requires: ["positional"], uses: ["positional"] },
  { rule: 2, requires: ["stdin"], uses: ["stdin"] },
  { rule: 3, requires: ["attachment"], uses: ["attachment"] },
  { rule: 0, requires: ["lastCapture"], uses: ["lastCapture"] },
];

export interface ComposeOptions {
  minLength?: number;
}

const normalizeSource = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

export const normalizeSources = (sources: QuerySources): QuerySources => {
  const normalized: QuerySources = {};
  const positional = normalizeSource(sources.positional);
  if (positional) normalized.positional = positional;
  const stdin = normalizeSource(sources.stdin);
  if (stdin) normalized.stdin = stdin;
  const attachment = normalizeSource(sources.attachment);
  if (attachment) normalized.attachment = attachment;
  const lastCapture = normalizeSource(sources.lastCapture);
  if (lastCapture) normalized.lastCapture = lastCapture;
  return normalized;
};

export const composeQuery = (sources: QuerySources, options: ComposeOptions = {}): Query => {
  const minLength = options.minLength ?? DEFAULT_QUERY.minLength;
  const present = normalizeSources(sources);
  const match = PRECEDENCE_RULES.find((candidate) =>
    candidate.requires.every((name) => present[name] !== undefined),
  );
  if (!match) {
    throw new EmptyQueryError();
  }
  const used: QuerySources = {};
  for (const name of match.uses) used[name] = present[name];
  const effectiveText = match.uses
    .map((name) => present[name])
    .filter((part): part is string => part !== undefined)
    .join(" ");
  if (effectiveText.length < minLength) {
    throw new InvalidQueryError(`Query is too short: at least ${minLength} characters are required.`, {
      minLength,
      length: effectiveText.length,
    });
  }
  return { ...used, effectiveText, rule: match.rule };
};

export const compose = (sources: QuerySources, options: ComposeOptions = {}): string =>
  composeQuery(sources, options).effectiveText;

export interface LimitedQuery {
  text: string;
  truncated: boolean;
}

export const limitQuery = (text: string, maxLength: number = DEFAULT_QUERY.maxLength): LimitedQuery => {
  if (codePointLength(text) <= maxLength) return { text, truncated: false };
  return { text: sliceCodePoints(text, maxLength), truncated: true };
};
