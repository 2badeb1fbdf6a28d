export { emailTool } from './emailTool';
export { queryIntentTool } from './queryIntentTool';
export { youtubeShortTool } from './youtubeShortTool';
