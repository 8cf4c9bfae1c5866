const MAX_SLUG_LENGTH = 100;

// Trailing hyphens are stripped again after the cut so a truncated slug never ends in '-'.
export const slugify = (text: string): string =>
  text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, MAX_SLUG_LENGTH)
    .replace(/-+$/, '');

export const generateFilename = (topic: string, category: string): string =>
  `${slugify(topic)}-${category}.html`;

export const buildOutputKey = (topic: string, category: string): string =>
  `output/${generateFilename(topic, category)}`;
