import { PutObjectCommand } from '@aws-sdk/client-s3';
import { PersistenceError, describeError } from '../errors';
import { buildOutputKey } from '../slug';
import { renderHtmlPage } from '../templates/articlePage';
import type { GenerationResult } from './contentService';

/** The slice of S3Client this service uses. */
export interface ObjectWriter {
  send(command: PutObjectCommand): Promise<unknown>;
}

const PAGE_CACHE_CONTROL = 'public, max-age=86400'; // 24 hours

export class PageService {
  constructor(
    private readonly s3Client: ObjectWriter,
    private readonly bucket: string
  ) {}

  /**
   * Renders the page and writes it to the output bucket. The key depends only on
   * topic and category, so a later run overwrites the earlier page.
   */
  async savePage(topic: string, category: string, result: GenerationResult): Promise<string> {
    const key = buildOutputKey(topic, category);

    const html = renderHtmlPage({
      topic,
      category,
      categoryName: result.categoryName,
      content: result.content,
      metaDescription: result.metaDescription
    });

    try {
      await this.s3Client.send(new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: Buffer.from(html, 'utf-8'),
        ContentType: 'text/html',
        CacheControl: PAGE_CACHE_CONTROL,
      }));
    } catch (error) {
      console.error(`[PageService] Failed to write s3://${this.bucket}/${key}:`, error);
      throw new PersistenceError(describeError(error), { cause: error });
    }

    return key;
  }
}
