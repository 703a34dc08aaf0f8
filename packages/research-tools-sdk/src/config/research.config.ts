import { z } from 'zod';

export const SUPPORTED_PROVIDERS = ['openai', 'azure', 'vllm'] as const;

export const TOKENIZER_ENCODINGS = [
  'cl100k_base',
  'o200k_base',
  'p50k_base',
  'r50k_base',
] as const;

const positiveInt = (name: string, fallback: number) =>
  z.coerce
    .number({ invalid_type_error: `${name} must be a number` })
    .int()
    .positive()
    .default(fallback);

const ResearchConfigSchema = z.object({
  bucket: z
    .string({
      description: 'Bucket holding the research files',
      required_error: 'Please provide the variable RESEARCH_BUCKET',
    })
    .min(1)
    .default('pharma_research_files'),
  storageRoot: z.string().min(1).default('./data'),
  model: z
    .string()
    .regex(new RegExp(`^(${SUPPORTED_PROVIDERS.join('|')})/.+$`), {
      message: `RESEARCH_MODEL must look like '<provider>/<model>' with provider one of ${SUPPORTED_PROVIDERS.join(', ')}`,
    })
    .default('openai/gpt-3.5-turbo'),
  openaiApiKey: z.string().min(1).optional(),
  azureApiKey: z.string().min(1).optional(),
  azureResourceName: z.string().min(1).optional(),
  vllmBaseUrl: z.string().url().optional(),
  vllmApiKey: z.string().min(1).optional(),
  tokenizerEncoding: z.enum(TOKENIZER_ENCODINGS).default('cl100k_base'),
  documentTokenLimit: positiveInt('DOCUMENT_TOKEN_LIMIT', 8000),
  chunkMaxTokens: positiveInt('CHUNK_MAX_TOKENS', 3000),
  summaryMaxOutputTokens: positiveInt('SUMMARY_MAX_OUTPUT_TOKENS', 800),
  summaryTemperature: z.coerce.number().min(0).max(2).default(0.1),
  summaryConcurrency: positiveInt('SUMMARY_CONCURRENCY', 1),
});

export type ResearchConfig = z.infer<typeof ResearchConfigSchema>;

const blankToUndefined = (value: string | undefined) =>
  value === undefined || value.trim() === '' ? undefined : value;

/** Reads and validates configuration; throws a ZodError on bad values. */
export function loadResearchConfig(
  env: NodeJS.ProcessEnv = process.env,
): ResearchConfig {
  const read = (key: string) => blankToUndefined(env[key]);
  return ResearchConfigSchema.parse({
    bucket: read('RESEARCH_BUCKET'),
    storageRoot: read('RESEARCH_STORAGE_ROOT'),
    model: read('RESEARCH_MODEL'),
    openaiApiKey: read('OPENAI_API_KEY'),
    azureApiKey: read('AZURE_API_KEY'),
    azureResourceName: read('AZURE_RESOURCE_NAME'),
    vllmBaseUrl: read('VLLM_BASE_URL'),
    vllmApiKey: read('VLLM_API_KEY'),
    tokenizerEncoding: read('TOKENIZER_ENCODING'),
    documentTokenLimit: read('DOCUMENT_TOKEN_LIMIT'),
    chunkMaxTokens: read('CHUNK_MAX_TOKENS'),
    summaryMaxOutputTokens: read('SUMMARY_MAX_OUTPUT_TOKENS'),
    summaryTemperature: read('SUMMARY_TEMPERATURE'),
    summaryConcurrency: read('SUMMARY_CONCURRENCY'),
  });
}
