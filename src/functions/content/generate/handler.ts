import type { APIGatewayProxyResult } from 'aws-lambda';
import { BedrockRuntimeClient } from '@aws-sdk/client-bedrock-runtime';
import { S3Client } from '@aws-sdk/client-s3';
import { formatErrorResponse, formatJSONResponse, getHttpMethod, parseRequestBody, type GatewayEvent } from '@libs/apiGateway';
import { CATEGORY_CONFIG, findInvalidCategories, type CategoryTable } from '@libs/categories';
import { loadConfig, type AppConfig } from '@libs/config';
import { ValidationError } from '@libs/errors';
import { middyfy } from '@libs/lambda';
import { BatchService, type BatchOutcome, type GenerationRequest } from '@libs/services/batchService';
import { BedrockService } from '@libs/services/bedrockService';
import { ContentService } from '@libs/services/contentService';
import { PageService } from '@libs/services/pageService';

export interface GenerateHandlerDeps {
  config: AppConfig;
  batchService: Pick<BatchService, 'run'>;
  categories?: CategoryTable;
}

const isStringArray = (value: unknown[]): value is string[] =>
  value.every(item => typeof item === 'string');

/**
 * Checks the request body and returns the topics and categories to generate.
 * Throws ValidationError before any generation happens.
 */
export const parseGenerationRequest = (
  body: Record<string, unknown>,
  categoryTable: CategoryTable = CATEGORY_CONFIG
): GenerationRequest => {
  const { topics, categories } = body;

  if (!Array.isArray(topics) || topics.length === 0) {
    throw new ValidationError('At least one topic is required');
  }
  if (!isStringArray(topics) || topics.some(topic => topic.trim() === '')) {
    throw new ValidationError('Topics must be non-empty strings');
  }

  if (!Array.isArray(categories) || categories.length === 0) {
    throw new ValidationError('At least one category is required');
  }
  if (!isStringArray(categories)) {
    throw new ValidationError('Categories must be strings');
  }

  const invalidCategories = findInvalidCategories(categories, categoryTable);
  if (invalidCategories.length > 0) {
    throw new ValidationError(`Invalid categories: ${invalidCategories.join(', ')}`, 400, { invalidCategories });
  }

  return { topics, categories };
};

const toResponseBody = (outcome: BatchOutcome): Record<string, unknown> => ({
  success: outcome.success,
  generated: outcome.generated.map(page => ({
    topic: page.topic,
    category: page.category,
    output_path: page.outputPath,
    created_at: page.createdAt
  })),
  failed: outcome.failed.map(failure => ({
    topic: failure.topic,
    category: failure.category,
    error: failure.error,
    code: failure.code
  })),
  total_generated: outcome.totalGenerated,
  message: outcome.message
});

/**
 * POST /generate
 * Body: { "topics": ["topic1", ...], "categories": ["facts", ...] }
 *
 * Answers 200 once the request is valid, even when pairs failed; callers read
 * `success` and `failed` for partial failure.
 */
export const createGenerateHandler = (deps: GenerateHandlerDeps) => {
  const { config, batchService, categories = CATEGORY_CONFIG } = deps;

  return async (event: GatewayEvent): Promise<APIGatewayProxyResult> => {
    const method = getHttpMethod(event);

    if (method === 'OPTIONS') {
      return formatJSONResponse({});
    }

    if (method !== 'POST') {
      return formatJSONResponse({ error: 'Method not allowed' }, 405);
    }

    let request: GenerationRequest;
    try {
      request = parseGenerationRequest(parseRequestBody(event), categories);

      if (!config.outputBucket) {
        throw new ValidationError('OUTPUT_BUCKET_NAME not configured', 500);
      }
    } catch (error) {
      return formatErrorResponse(error);
    }

    console.log(`[generateContent] Generating ${request.topics.length * request.categories.length} pages`, {
      topics: request.topics.length,
      categories: request.categories
    });

    const outcome = await batchService.run(request);

    return formatJSONResponse(toResponseBody(outcome));
  };
};

// Clients are created once per container and reused across warm invocations.
const config = loadConfig();
const bedrockService = new BedrockService(new BedrockRuntimeClient({}), config.bedrockModelId);
const contentService = new ContentService(bedrockService);
const pageService = new PageService(new S3Client({}), config.outputBucket);
const batchService = new BatchService(contentService, pageService);

export const main = middyfy(createGenerateHandler({ config, batchService }));
