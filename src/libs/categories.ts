export interface CategoryDefinition {
  readonly name: string;
  /** Contains a `{topic}` placeholder. */
  readonly promptTemplate: string;
}

export type CategoryTable = Readonly<Record<string, CategoryDefinition>>;

export const CATEGORY_CONFIG: CategoryTable = Object.freeze({
  facts: {
    name: 'Interesting Facts',
    promptTemplate:
      'Write an engaging article presenting the most interesting and surprising facts about {topic}. ' +
      'Group related facts into sections and explain why each one matters.'
  },
  history: {
    name: 'History',
    promptTemplate:
      'Write an informative article about the history of {topic}. ' +
      'Cover its origins, key milestones and turning points, and how it developed into what it is today.'
  },
  guide: {
    name: 'Beginner Guide',
    promptTemplate:
      'Write a beginner-friendly guide to {topic}. ' +
      'Explain the core concepts in plain language, walk through the first steps, and point out common pitfalls.'
  },
  tips: {
    name: 'Tips & Tricks',
    promptTemplate:
      'Write a practical article with the best tips and tricks for {topic}. ' +
      'Each tip should be actionable and include a short example.'
  },
  faq: {
    name: 'Frequently Asked Questions',
    promptTemplate:
      'Write an article answering the most frequently asked questions about {topic}. ' +
      'Use each question as a section header and give a clear, accurate answer.'
  },
  myths: {
    name: 'Myths & Misconceptions',
    promptTemplate:
      'Write an article debunking common myths and misconceptions about {topic}. ' +
      'For each myth, state it, explain why people believe it, and describe what is actually true.'
  }
});

export const isKnownCategory = (key: string, table: CategoryTable = CATEGORY_CONFIG): boolean =>
  Object.prototype.hasOwnProperty.call(table, key);

export const findInvalidCategories = (keys: string[], table: CategoryTable = CATEGORY_CONFIG): string[] =>
  Array.from(new Set(keys.filter(key => !isKnownCategory(key, table))));
