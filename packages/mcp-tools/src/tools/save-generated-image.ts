import type { McpToolDefinition } from '../types';

/**
 * Download a generated image and store it as a local PNG
 */
export const saveGeneratedImage: McpToolDefinition = {
  name: 'save_generated_image',
  description:
    'Download an image from a URL (e.g. one returned by generate_image) and save it as a PNG file on the local disk.',
  inputSchema: {
    type: 'object',
    properties: {
      image_url: {
        type: 'string',
        description: 'URL of the image to download',
      },
      filename: {
        type: 'string',
        description:
          'File name without extension. Defaults to dalle_YYYYMMDD_HHMMSS. A trailing .png, .jpg or .jpeg is dropped and .png is always used.',
      },
      save_path: {
        type: 'string',
        description:
          'Directory to save into, absolute or relative to the project root (default: "generated_images")',
      },
    },
    required: ['image_url'],
  },
};
