import { Mastra } from '@mastra/core/mastra';
import { datasetQueryAgent, emailSummaryAgent, youtubeShortAgent } from './agents';
import { emailSummaryWorkflow } from './workflows/emailSummaryWorkflow';

export const mastra = new Mastra({
  agents: { datasetQueryAgent, emailSummaryAgent, youtubeShortAgent },
  workflows: { emailSummaryWorkflow },
});
