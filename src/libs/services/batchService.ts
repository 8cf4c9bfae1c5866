import { classifyError, describeError, type FailureCode } from '../errors';
import type { ContentService } from './contentService';
import type { PageService } from './pageService';

export interface GenerationRequest {
  topics: string[];
  categories: string[];
}

export interface GeneratedPageRecord {
  topic: string;
  category: string;
  outputPath: string;
  createdAt: string;
}

export interface FailureRecord {
  topic: string;
  category: string;
  error: string;
  code: FailureCode;
}

export type PairOutcome =
  | { ok: true; page: GeneratedPageRecord }
  | { ok: false; failure: FailureRecord };

export interface BatchOutcome {
  success: boolean;
  generated: GeneratedPageRecord[];
  failed: FailureRecord[];
  totalGenerated: number;
  message: string;
}

export const summarize = (generated: number, failed: number): string =>
  failed > 0
    ? `Generated ${generated} pages. ${failed} failed.`
    : `Successfully generated ${generated} pages.`;

export class BatchService {
  constructor(
    private readonly contentService: Pick<ContentService, 'generateContent'>,
    private readonly pageService: Pick<PageService, 'savePage'>,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Generates and stores one page. Never rejects: any error from either step
   * becomes a failure outcome for this pair only.
   */
  async processPair(topic: string, category: string): Promise<PairOutcome> {
    try {
      const result = await this.contentService.generateContent(topic, category);
      const outputPath = await this.pageService.savePage(topic, category, result);

      return {
        ok: true,
        page: { topic, category, outputPath, createdAt: this.now().toISOString() }
      };
    } catch (error) {
      return {
        ok: false,
        failure: { topic, category, error: describeError(error), code: classifyError(error) }
      };
    }
  }

  // Pairs run one at a time, topics outer and categories inner.
  async run(request: GenerationRequest): Promise<BatchOutcome> {
    const generated: GeneratedPageRecord[] = [];
    const failed: FailureRecord[] = [];

    for (const topic of request.topics) {
      for (const category of request.categories) {
        const outcome = await this.processPair(topic, category);

        if (outcome.ok) {
          console.log(`[BatchService] Generated ${outcome.page.outputPath}`);
          generated.push(outcome.page);
        } else {
          console.error(`[BatchService] Failed "${topic}" / ${category} (${outcome.failure.code}): ${outcome.failure.error}`);
          failed.push(outcome.failure);
        }
      }
    }

    console.log(`[BatchService] Batch complete: ${generated.length} generated, ${failed.length} failed`);

    return {
      success: failed.length === 0,
      generated,
      failed,
      totalGenerated: generated.length,
      message: summarize(generated.length, failed.length)
    };
  }
}
