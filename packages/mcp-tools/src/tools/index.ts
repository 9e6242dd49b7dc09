/**
 * Export all tool definitions
 * Add new tools here as they are created
 */

export { generateAndSaveImage } from './generate-and-save-image';
export { generateImage } from './generate-image';
export { saveGeneratedImage } from './save-generated-image';
