import type { McpToolDefinition } from '../types';
import { generateImage } from './generate-image';
import { saveGeneratedImage } from './save-generated-image';

/**
 * generate_image followed by save_generated_image in one call
 */
export const generateAndSaveImage: McpToolDefinition = {
  name: 'generate_and_save_image',
  description:
    'Generate an image with OpenAI DALL-E 3 and save it locally as a PNG. If saving fails the generated image URL is still returned, together with save_error.',
  inputSchema: {
    type: 'object',
    properties: {
      ...generateImage.inputSchema.properties,
      filename: saveGeneratedImage.inputSchema.properties.filename,
      save_path: saveGeneratedImage.inputSchema.properties.save_path,
    },
    required: ['prompt'],
  },
};
