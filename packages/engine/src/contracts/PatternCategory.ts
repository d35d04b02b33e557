/**
 * @fileoverview Pattern Category Contract
 *
 * The closed set of manipulation categories the engine reports on.
 * The tuple order is the canonical order used by every report.
 *
 * Adding a category means adding one variant here, one entry in
 * {@link CATEGORY_INFO} and one entry in the detector table; the
 * `Record<PatternCategory, ...>` types make the compiler flag any
 * place that was missed.
 *
 * @module @slant/engine/contracts/PatternCategory
 */

/**
 * All categories, in canonical report order.
 */
export const PATTERN_CATEGORIES = [
    "LOADED_LANGUAGE",
    "FALSE_URGENCY",
    "GUILT_INDUCTION",
    "VAGUE_GENERALIZATION",
    "APPEAL_TO_EMOTION",
    "FALSE_DICHOTOMY",
    "FEAR_APPEAL",
] as const;

/**
 * A manipulation category tag.
 */
export type PatternCategory = (typeof PATTERN_CATEGORIES)[number];

/**
 * Static description of a category.
 */
export interface CategoryInfo {
    /** Human-readable name */
    readonly label: string;

    /** What the category looks for, shown next to its score */
    readonly description: string;

    /** Whether the lexical store must carry a cue table for this category */
    readonly usesLexicon: boolean;
}

export const CATEGORY_INFO: Readonly<Record<PatternCategory, CategoryInfo>> = {
    LOADED_LANGUAGE: {
        label      : "Loaded language",
        description: "Words with strong connotations used to sway the reader instead of describing",
        usesLexicon: true,
    },
    FALSE_URGENCY: {
        label      : "False urgency",
        description: "Artificial time pressure pushing the reader to act before thinking",
        usesLexicon: true,
    },
    GUILT_INDUCTION: {
        label      : "Guilt induction",
        description: "Blame and obligation placed on the reader to force compliance",
        usesLexicon: true,
    },
    VAGUE_GENERALIZATION: {
        label      : "Vague generalization",
        description: "Sweeping or absolute claims about unspecified groups, times or sources",
        usesLexicon: true,
    },
    APPEAL_TO_EMOTION: {
        label      : "Appeal to emotion",
        description: "Emotionally extreme wording aimed directly at the reader",
        usesLexicon: true,
    },
    FALSE_DICHOTOMY: {
        label      : "False dichotomy",
        description: "A situation framed as having only two possible options",
        usesLexicon: false,
    },
    FEAR_APPEAL: {
        label      : "Fear appeal",
        description: "Threats of harm, often tied to a named person or organization",
        usesLexicon: true,
    },
};

/**
 * Type guard for category tags coming from configuration or payloads.
 */
export function isPatternCategory(value: unknown): value is PatternCategory {
    return typeof value === "string" && Object.prototype.hasOwnProperty.call(CATEGORY_INFO, value);
}

/**
 * Position of a category in the canonical order.
 */
export function categoryOrder(category: PatternCategory): number {
    return PATTERN_CATEGORIES.indexOf(category);
}
