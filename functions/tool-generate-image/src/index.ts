import type { Credentials } from '@openai-images/config';
import {
  generateImage as generateImageTool,
  optionalString,
  type ToolFailure,
  type ToolHandler,
} from '@openai-images/mcp-tools';
import { createImage, OpenAIApiError } from '@openai-images/openai-api';

export const VALID_SIZES = ['1024x1024', '1792x1024', '1024x1792'] as const;
export const VALID_QUALITIES = ['standard', 'hd'] as const;
export const VALID_STYLES = ['vivid', 'natural'] as const;
export const MAX_PROMPT_LENGTH = 4000;

export type ImageSize = (typeof VALID_SIZES)[number];
export type ImageQuality = (typeof VALID_QUALITIES)[number];
export type ImageStyle = (typeof VALID_STYLES)[number];

/**
 * Validated generation request
 */
export interface GenerateImageRequest {
  prompt: string;
  size: ImageSize;
  quality: ImageQuality;
  style: ImageStyle;
  model: string;
}

/**
 * Echo of the parameters an image was generated with
 */
export type GenerationParameters = Omit<GenerateImageRequest, 'prompt'>;

export interface GenerateImageSuccess {
  success: true;
  /** Temporary URL, expires about an hour after generation */
  image_url: string;
  /** Prompt after the model's own rewriting; null if the model did not report one */
  revised_prompt: string | null;
  parameters: GenerationParameters;
  message: string;
}

export type GenerateImageResult = GenerateImageSuccess | ToolFailure;

export type ValidationResult =
  | { ok: true; request: GenerateImageRequest; apiKey: string }
  | { ok: false; error: string };

/**
 * MCP Tool Input Schema
 * Re-exported from shared package for use by MCP server
 */
export const toolSchema = generateImageTool;

function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  return values.some((candidate) => candidate === value);
}

/**
 * Validate tool arguments. Pure: no I/O, first violation wins.
 *
 * Order: credentials, size, quality, style, prompt, model.
 */
export function validateRequest(
  args: Record<string, unknown>,
  credentials: Credentials,
  defaultModel: string
): ValidationResult {
  if (!credentials.apiKey) {
    return {
      ok: false,
      error: 'Missing OpenAI API credentials. Please set OPENAI_API_KEY environment variable.',
    };
  }

  const size = optionalString(args.size) ?? '1024x1024';
  if (!isOneOf(VALID_SIZES, size)) {
    return { ok: false, error: `Invalid size. Must be one of: ${VALID_SIZES.join(', ')}` };
  }

  const quality = optionalString(args.quality) ?? 'standard';
  if (!isOneOf(VALID_QUALITIES, quality)) {
    return { ok: false, error: `Invalid quality. Must be one of: ${VALID_QUALITIES.join(', ')}` };
  }

  const style = optionalString(args.style) ?? 'vivid';
  if (!isOneOf(VALID_STYLES, style)) {
    return { ok: false, error: `Invalid style. Must be one of: ${VALID_STYLES.join(', ')}` };
  }

  const { prompt } = args;
  if (typeof prompt !== 'string' || prompt.trim() === '') {
    return { ok: false, error: 'prompt is required and must be a non-empty string' };
  }
  // Count code points, not UTF-16 units
  if ([...prompt].length > MAX_PROMPT_LENGTH) {
    return {
      ok: false,
      error: `Prompt too long. Maximum ${MAX_PROMPT_LENGTH} characters for DALL-E 3.`,
    };
  }

  const model = optionalString(args.model) ?? defaultModel;
  if (model.trim() === '') {
    return { ok: false, error: 'model must be a non-empty string' };
  }

  return {
    ok: true,
    request: { prompt, size, quality, style, model },
    apiKey: credentials.apiKey,
  };
}

/**
 * Turn an upstream failure into a user-facing message.
 *
 * Prefers the API's structured error code; falls back to matching the error
 * text. Text matching is a compatibility shim and can misclassify if the
 * upstream wording changes.
 */
export function classifyGenerationError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  const code = error instanceof OpenAIApiError ? error.code : undefined;
  const haystack = (code ?? message).toLowerCase();

  if (haystack.includes('api_key')) {
    return 'API key authentication failed. Please check your OpenAI API key.';
  }
  if (haystack.includes('rate_limit')) {
    return 'Rate limit exceeded. Please wait before trying again.';
  }
  if (haystack.includes('quota')) {
    return 'API quota exceeded. Please check your OpenAI account billing.';
  }
  return `Failed to generate image: ${message}`;
}

/**
 * Generate one image and return its temporary URL
 */
export const handler: ToolHandler<GenerateImageResult> = async (args, context) => {
  const validation = validateRequest(args, context.credentials, context.defaultModel);
  if (!validation.ok) {
    return { success: false, error: validation.error };
  }

  const { request, apiKey } = validation;

  try {
    const image = await createImage(request, {
      apiKey,
      baseUrl: context.apiBaseUrl,
      fetch: context.fetch,
      timeoutMs: context.timeoutMs,
    });

    if (!image.url) {
      throw new Error('No image URL in response');
    }

    console.error(`Generation complete: ${image.url}`);

    return {
      success: true,
      image_url: image.url,
      revised_prompt: image.revised_prompt ?? null,
      parameters: {
        size: request.size,
        quality: request.quality,
        style: request.style,
        model: request.model,
      },
      message: 'Image generated successfully. The URL will expire after 1 hour.',
    };
  } catch (error) {
    console.error('Image generation failed:', error);
    return { success: false, error: classifyGenerationError(error) };
  }
};

/**
 * Export the tool schema for MCP server registration
 */
export { toolSchema as mcpToolSchema };
