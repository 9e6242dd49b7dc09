import {
  generateAndSaveImage as generateAndSaveImageTool,
  optionalString,
  type ToolFailure,
  type ToolHandler,
} from '@openai-images/mcp-tools';
import {
  handler as generateImage,
  type GenerateImageSuccess,
  type GenerationParameters,
} from '@openai-images/tool-generate-image';
import { saveImage } from '@openai-images/tool-save-generated-image';

/**
 * Generated and saved
 */
export interface GenerateAndSaveSuccess {
  success: true;
  image_url: string;
  revised_prompt: string | null;
  parameters: GenerationParameters;
  file_path: string;
  relative_path: string;
  filename: string;
  size_bytes: number;
  message: string;
}

/**
 * Generated but not saved. Still a success: the URL is usable until it expires.
 */
export interface GenerateAndSavePartial extends GenerateImageSuccess {
  save_error: string;
}

export type GenerateAndSaveResult = GenerateAndSaveSuccess | GenerateAndSavePartial | ToolFailure;

/**
 * MCP Tool Input Schema
 */
export const toolSchema = generateAndSaveImageTool;

/**
 * Generate an image, then save it locally. A failed generation is returned
 * as-is; a failed save keeps the generation result and adds save_error.
 */
export const handler: ToolHandler<GenerateAndSaveResult> = async (args, context) => {
  const generated = await generateImage(args, context);
  if (!generated.success) {
    return generated;
  }

  const saved = await saveImage(
    {
      image_url: generated.image_url,
      filename: optionalString(args.filename),
      save_path: optionalString(args.save_path),
    },
    context
  );

  if (!saved.success) {
    return {
      ...generated,
      save_error: saved.error,
      message: `Image generated but not saved: ${saved.error}`,
    };
  }

  return {
    success: true,
    image_url: generated.image_url,
    revised_prompt: generated.revised_prompt,
    parameters: generated.parameters,
    file_path: saved.file_path,
    relative_path: saved.relative_path,
    filename: saved.filename,
    size_bytes: saved.size_bytes,
    message: `Image generated and saved to ${saved.relative_path}`,
  };
};

/**
 * Export the tool schema for MCP server registration
 */
export { toolSchema as mcpToolSchema };
