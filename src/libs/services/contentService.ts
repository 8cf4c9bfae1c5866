import { CATEGORY_CONFIG, isKnownCategory, type CategoryDefinition, type CategoryTable } from '../categories';
import { UnknownCategoryError } from '../errors';
import type { TextGenerator } from './bedrockService';

export const META_DESCRIPTION_MAX_LENGTH = 160;

export interface GenerationResult {
  content: string;
  metaDescription: string;
  categoryName: string;
}

const ARTICLE_FORMAT_INSTRUCTIONS = `

Format the article in clean HTML suitable for a blog post. Include:
- A compelling <h1> title
- Use <h2> and <h3> for section headers
- Use <p> tags for paragraphs
- Use <ul>/<ol> and <li> for lists where appropriate
- Use <strong> and <em> for emphasis
- Do NOT include <html>, <head>, or <body> tags - just the article content
- Make the content engaging, well-researched, and approximately 800-1200 words`;

export const buildArticlePrompt = (topic: string, definition: CategoryDefinition): string =>
  definition.promptTemplate.replace(/\{topic\}/g, () => topic) + ARTICLE_FORMAT_INSTRUCTIONS;

export const buildMetaPrompt = (topic: string, definition: CategoryDefinition): string =>
  `Write a compelling meta description (150-160 characters) for a blog article about "${topic}" focusing on ${definition.name.toLowerCase()}. \n` +
  'The description should be engaging and include the main keyword. Return ONLY the meta description text, nothing else.';

// Counts code points so a cut never splits a surrogate pair
export const truncateMetaDescription = (text: string): string =>
  Array.from(text.trim()).slice(0, META_DESCRIPTION_MAX_LENGTH).join('');

export class ContentService {
  constructor(
    private readonly generator: TextGenerator,
    private readonly categories: CategoryTable = CATEGORY_CONFIG
  ) {}

  /**
   * Generates the article body, then its meta description. Either call failing
   * fails the whole pair; a body produced before a failed description is dropped.
   */
  async generateContent(topic: string, category: string): Promise<GenerationResult> {
    if (!isKnownCategory(category, this.categories)) {
      throw new UnknownCategoryError(category);
    }
    const definition = this.categories[category];

    const content = await this.generator.generateText(buildArticlePrompt(topic, definition));
    const metaDescription = truncateMetaDescription(
      await this.generator.generateText(buildMetaPrompt(topic, definition))
    );

    return {
      content,
      metaDescription,
      categoryName: definition.name
    };
  }
}
