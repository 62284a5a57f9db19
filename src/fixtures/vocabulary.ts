import vocabulary from "./vocabulary.json" with { type: "json" };

/** Word lists the generators draw names and descriptions from. */
export type Vocabulary = typeof vocabulary;

export const VOCABULARY: Vocabulary = vocabulary;
