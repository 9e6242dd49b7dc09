import { mkdir, writeFile } from 'node:fs/promises';
import { isAbsolute, join, relative, resolve } from 'node:path';
import {
  optionalString,
  saveGeneratedImage as saveGeneratedImageTool,
  type ToolContext,
  type ToolFailure,
  type ToolHandler,
} from '@openai-images/mcp-tools';
import { downloadImage, ImageDownloadError } from '@openai-images/openai-api';

/** Directory under the project root used when no save_path is given */
export const DEFAULT_SAVE_DIRECTORY = 'generated_images';
/** Prefix of synthesized file names: dalle_YYYYMMDD_HHMMSS.png */
export const FILENAME_PREFIX = 'dalle';

const IMAGE_EXTENSION = /\.(png|jpg|jpeg)$/;

/**
 * Request body for saving an image
 * Compatible with MCP tool schema
 */
export interface SaveImageRequest {
  /** URL to download */
  image_url: string;
  /** File name without extension (default: timestamp) */
  filename?: string;
  /** Target directory, absolute or relative to the project root */
  save_path?: string;
}

export interface SaveImageSuccess {
  success: true;
  file_path: string;
  /** Path relative to the project root, for display */
  relative_path: string;
  /** File name including the .png extension */
  filename: string;
  size_bytes: number;
  message: string;
}

export type SaveImageResult = SaveImageSuccess | ToolFailure;

/**
 * MCP Tool Input Schema
 */
export const toolSchema = saveGeneratedImageTool;

/**
 * Local time as YYYYMMDD_HHMMSS
 */
export function formatTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Absolute save_path is used as-is, relative is resolved against the project root
 */
export function resolveSaveDirectory(projectRoot: string, savePath?: string): string {
  if (!savePath) {
    return join(projectRoot, DEFAULT_SAVE_DIRECTORY);
  }
  return isAbsolute(savePath) ? savePath : resolve(projectRoot, savePath);
}

/**
 * Always ends in .png. One trailing .png/.jpg/.jpeg is dropped first so
 * "art.png" stays "art.png"; the match is case-sensitive.
 */
export function resolveFilename(filename: string | undefined, now: Date): string {
  if (!filename) {
    return `${FILENAME_PREFIX}_${formatTimestamp(now)}.png`;
  }
  return `${filename.replace(IMAGE_EXTENSION, '')}.png`;
}

/**
 * A bare file name: no directory part and no parent reference
 */
export function isPlainFilename(filename: string): boolean {
  return !/[/\\]/.test(filename) && filename !== '..' && filename !== '.';
}

/**
 * Download an image and write it to disk, overwriting any existing file.
 * Nothing is written when the download fails.
 */
export async function saveImage(
  request: SaveImageRequest,
  context: ToolContext
): Promise<SaveImageResult> {
  if (!request.image_url || request.image_url.trim() === '') {
    return { success: false, error: 'image_url is required and must be a non-empty string' };
  }

  if (request.filename && !isPlainFilename(request.filename)) {
    return { success: false, error: 'filename must not contain path separators or ".."' };
  }

  const directory = resolveSaveDirectory(context.projectRoot, request.save_path);
  const filename = resolveFilename(request.filename, context.now());
  const filePath = join(directory, filename);

  try {
    const buffer = await downloadImage(request.image_url, {
      fetch: context.fetch,
      timeoutMs: context.timeoutMs,
    });

    await mkdir(directory, { recursive: true });
    await writeFile(filePath, buffer);

    const relativePath = relative(context.projectRoot, filePath);
    console.error(`Saved ${buffer.length} bytes to ${filePath}`);

    return {
      success: true,
      file_path: filePath,
      relative_path: relativePath,
      filename,
      size_bytes: buffer.length,
      message: `Image saved to ${relativePath}`,
    };
  } catch (error) {
    console.error('Failed to save image:', error);
    if (error instanceof ImageDownloadError) {
      return { success: false, error: error.message };
    }
    const message = error instanceof Error ? error.message : String(error);
    return { success: false, error: `Failed to save image: ${message}` };
  }
}

/**
 * Parse tool arguments into a save request
 */
export function parseRequest(args: Record<string, unknown>): SaveImageRequest {
  return {
    image_url: typeof args.image_url === 'string' ? args.image_url : '',
    filename: optionalString(args.filename),
    save_path: optionalString(args.save_path),
  };
}

/**
 * Save an image from a URL to local disk
 */
export const handler: ToolHandler<SaveImageResult> = async (args, context) =>
  saveImage(parseRequest(args), context);

/**
 * Export the tool schema for MCP server registration
 */
export { toolSchema as mcpToolSchema };
