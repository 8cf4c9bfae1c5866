export const DEFAULT_BEDROCK_MODEL_ID = 'anthropic.claude-3-haiku-20240307-v1:0';

export interface AppConfig {
  outputBucket: string;
  bedrockModelId: string;
}

// Read once at cold start; an empty bucket name is reported per request, not here.
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => ({
  outputBucket: env.OUTPUT_BUCKET_NAME || '',
  bedrockModelId: env.BEDROCK_MODEL_ID || DEFAULT_BEDROCK_MODEL_ID
});
