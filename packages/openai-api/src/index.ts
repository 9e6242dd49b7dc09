/**
 * OpenAI Images API Client
 * Utilities for calling the image generation endpoint and fetching its output
 */

export const OPENAI_API_BASE_URL = 'https://api.openai.com/v1';

/**
 * One generated image as returned by the Images API
 */
export interface OpenAIImageData {
  /** Temporary URL of the image (response_format: "url") */
  url?: string;
  /** Base64 encoded image (response_format: "b64_json") */
  b64_json?: string;
  /** Prompt the model actually used, after its own rewriting */
  revised_prompt?: string;
}

/**
 * Body of POST /images/generations
 */
export interface CreateImageParams {
  model: string;
  prompt: string;
  size: string;
  quality: string;
  style: string;
}

export interface RequestOptions {
  /** Fetch implementation (defaults to the global fetch) */
  fetch?: typeof fetch;
  /** Abort the request after this many milliseconds; unbounded when omitted */
  timeoutMs?: number;
}

export interface OpenAIRequestOptions extends RequestOptions {
  apiKey: string;
  baseUrl?: string;
}

/**
 * Error raised for a non-2xx response from the OpenAI API.
 * `code` and `type` come from the `error` object of the response body when present.
 */
export class OpenAIApiError extends Error {
  status: number;
  code?: string;
  type?: string;

  constructor(status: number, body: string) {
    super(`OpenAI API error: ${status} - ${body}`);
    this.name = 'OpenAIApiError';
    this.status = status;
    const details = parseErrorBody(body);
    this.code = details.code;
    this.type = details.type;
  }
}

/**
 * Error raised when an image download does not answer 200
 */
export class ImageDownloadError extends Error {
  status: number;

  constructor(status: number) {
    super(`Failed to download image: HTTP ${status}`);
    this.name = 'ImageDownloadError';
    this.status = status;
  }
}

function parseErrorBody(body: string): { code?: string; type?: string } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return {};
  }
  if (typeof parsed !== 'object' || parsed === null || !('error' in parsed)) {
    return {};
  }
  const { error } = parsed;
  if (typeof error !== 'object' || error === null) {
    return {};
  }
  return {
    code: 'code' in error && typeof error.code === 'string' ? error.code : undefined,
    type: 'type' in error && typeof error.type === 'string' ? error.type : undefined,
  };
}

/**
 * First entry of `data` in a generations response, or null when there is none
 */
function firstImage(body: unknown): OpenAIImageData | null {
  if (typeof body !== 'object' || body === null || !('data' in body) || !Array.isArray(body.data)) {
    return null;
  }
  const entry: unknown = body.data[0];
  if (typeof entry !== 'object' || entry === null) {
    return null;
  }
  return {
    url: 'url' in entry && typeof entry.url === 'string' ? entry.url : undefined,
    b64_json: 'b64_json' in entry && typeof entry.b64_json === 'string' ? entry.b64_json : undefined,
    revised_prompt:
      'revised_prompt' in entry && typeof entry.revised_prompt === 'string'
        ? entry.revised_prompt
        : undefined,
  };
}

function timeoutSignal(timeoutMs?: number): AbortSignal | undefined {
  return timeoutMs ? AbortSignal.timeout(timeoutMs) : undefined;
}

/**
 * Call POST /images/generations for exactly one image, returned as a URL.
 * DALL-E 3 only supports n=1.
 */
export async function createImage(
  params: CreateImageParams,
  options: OpenAIRequestOptions
): Promise<OpenAIImageData> {
  const fetchImpl = options.fetch ?? fetch;
  const baseUrl = (options.baseUrl ?? OPENAI_API_BASE_URL).replace(/\/+$/, '');
  const endpoint = '/images/generations';

  console.error(`Calling OpenAI Images API: ${endpoint} (model: ${params.model})`);
  console.error(`Prompt: ${params.prompt.substring(0, 100)}...`);

  const response = await fetchImpl(`${baseUrl}${endpoint}`, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${options.apiKey}`,
    },
    body: JSON.stringify({
      model: params.model,
      prompt: params.prompt,
      n: 1,
      size: params.size,
      quality: params.quality,
      style: params.style,
      response_format: 'url',
    }),
    signal: timeoutSignal(options.timeoutMs),
  });

  if (!response.ok) {
    const errorText = await response.text();
    console.error(`OpenAI API Error: ${response.status} - ${errorText}`);
    throw new OpenAIApiError(response.status, errorText);
  }

  const image = firstImage(await response.json());
  if (!image) {
    throw new Error('No image generated');
  }

  return image;
}

/**
 * Download an image and return its bytes untouched
 */
export async function downloadImage(url: string, options: RequestOptions = {}): Promise<Buffer> {
  const fetchImpl = options.fetch ?? fetch;

  console.error(`Downloading image from URL: ${url}`);
  const response = await fetchImpl(url, { signal: timeoutSignal(options.timeoutMs) });
  if (response.status !== 200) {
    throw new ImageDownloadError(response.status);
  }
  const arrayBuffer = await response.arrayBuffer();
  return Buffer.from(arrayBuffer);
}
