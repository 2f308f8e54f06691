import { InvalidOptionsError } from "./errors";
import { BionicOptions, BoundaryMode, ResolvedOptions } from "./types";

export const DEFAULT_EXCLUDED_TAGS = [
  "script",
  "style",
  "pre",
  "code",
  "b",
  "strong",
  "svg",
  "math",
  "head",
  "textarea",
];

export const DEFAULT_OPTIONS: BionicOptions = {
  minBoldFraction: 0.5,
  excludedTags: DEFAULT_EXCLUDED_TAGS,
  wordBoundaryPolicy: { apostrophes: "join", hyphens: "split" },
  emphasisTag: "b",
};

// Inline elements that only carry emphasis; the chosen one is excluded from
// scanning, so a general container such as span would freeze source text
export const EMPHASIS_TAG_CHOICES: readonly string[] = ["b", "strong", "em", "mark"];
const BOUNDARY_MODES: readonly BoundaryMode[] = ["join", "split"];

/**
 * Lower-cases a tag name and drops any namespace prefix ("svg:svg" -> "svg").
 */
export function localTagName(name: string): string {
  const colon = name.lastIndexOf(":");
  return (colon >= 0 ? name.slice(colon + 1) : name).toLowerCase();
}

export function parseBoundaryMode(value: string, field: string): BoundaryMode {
  const mode = BOUNDARY_MODES.find(m => m === value);
  if (!mode) {
    throw new InvalidOptionsError(`wordBoundaryPolicy.${field} must be "join" or "split", got "${value}"`);
  }
  return mode;
}

/**
 * Merges partial options over the defaults and validates the result.
 * The emphasis tag is always excluded so emboldened prefixes are never re-entered.
 */
export function resolveOptions(options: Partial<BionicOptions> = {}): ResolvedOptions {
  const fraction = options.minBoldFraction ?? DEFAULT_OPTIONS.minBoldFraction;
  if (!Number.isFinite(fraction) || fraction <= 0 || fraction > 1) {
    throw new InvalidOptionsError(`minBoldFraction must be in (0, 1], got ${fraction}`);
  }

  const emphasisTag = (options.emphasisTag ?? DEFAULT_OPTIONS.emphasisTag).trim().toLowerCase();
  if (!EMPHASIS_TAG_CHOICES.includes(emphasisTag)) {
    throw new InvalidOptionsError(
      `emphasisTag must be one of ${EMPHASIS_TAG_CHOICES.join(", ")}, got "${emphasisTag}"`,
    );
  }

  const excludedTags = new Set<string>();
  for (const tag of options.excludedTags ?? DEFAULT_OPTIONS.excludedTags) {
    const trimmed = tag.trim();
    if (!trimmed) continue;
    excludedTags.add(localTagName(trimmed));
  }
  const emphasisTags = new Set<string>(["b", "strong", emphasisTag]);
  excludedTags.add(emphasisTag);

  const policy = { ...DEFAULT_OPTIONS.wordBoundaryPolicy, ...options.wordBoundaryPolicy };

  return {
    minBoldFraction: fraction,
    excludedTags,
    wordBoundaryPolicy: {
      apostrophes: parseBoundaryMode(policy.apostrophes, "apostrophes"),
      hyphens: parseBoundaryMode(policy.hyphens, "hyphens"),
    },
    emphasisTag,
    emphasisTags,
  };
}

export interface OptionFields {
  fraction?: string;
  exclude?: string;
  hyphens?: string;
  apostrophes?: string;
  emphasisTag?: string;
}

/**
 * Builds options from string settings such as CLI flags or form fields.
 * Unset fields keep their defaults; values are checked by resolveOptions.
 */
export function parseOptionFields(fields: OptionFields): Partial<BionicOptions> {
  const options: Partial<BionicOptions> = {};

  if (fields.fraction !== undefined && fields.fraction !== "") {
    const fraction = Number(fields.fraction);
    if (Number.isNaN(fraction)) {
      throw new InvalidOptionsError(`minBoldFraction must be a number, got "${fields.fraction}"`);
    }
    options.minBoldFraction = fraction;
  }
  if (fields.exclude !== undefined && fields.exclude !== "") {
    options.excludedTags = fields.exclude.split(",");
  }
  if (fields.hyphens || fields.apostrophes) {
    options.wordBoundaryPolicy = {
      hyphens: parseBoundaryMode(fields.hyphens || DEFAULT_OPTIONS.wordBoundaryPolicy.hyphens, "hyphens"),
      apostrophes: parseBoundaryMode(fields.apostrophes || DEFAULT_OPTIONS.wordBoundaryPolicy.apostrophes, "apostrophes"),
    };
  }
  if (fields.emphasisTag) {
    options.emphasisTag = fields.emphasisTag;
  }

  resolveOptions(options);
  return options;
}
