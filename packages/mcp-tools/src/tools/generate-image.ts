import type { McpToolDefinition } from '../types';

/**
 * Text-to-Image generation using DALL-E 3 (OpenAI)
 */
export const generateImage: McpToolDefinition = {
  name: 'generate_image',
  description:
    'Generate an image from a text prompt using OpenAI DALL-E 3. Returns a temporary image URL (expires after about 1 hour) and the revised prompt the model used.',
  inputSchema: {
    type: 'object',
    properties: {
      prompt: {
        type: 'string',
        description: 'Text description of the image to generate (max 4000 characters)',
        maxLength: 4000,
      },
      size: {
        type: 'string',
        description: 'Image dimensions (default: "1024x1024")',
        enum: ['1024x1024', '1792x1024', '1024x1792'],
        default: '1024x1024',
      },
      quality: {
        type: 'string',
        description: '"standard" (faster, lower cost) or "hd" (higher quality, slower)',
        enum: ['standard', 'hd'],
        default: 'standard',
      },
      style: {
        type: 'string',
        description: '"vivid" (dramatic, hyper-real) or "natural" (more natural, less stylized)',
        enum: ['vivid', 'natural'],
        default: 'vivid',
      },
      model: {
        type: 'string',
        description: 'Image model to use (default: the server\'s configured model, "dall-e-3")',
      },
    },
    required: ['prompt'],
  },
};
