import { createReadStream, existsSync } from 'node:fs';
import { google, type youtube_v3 } from 'googleapis';
import { OAuth2Client } from 'google-auth-library';
import { config } from '../../config';
import logger from '../../utils/logger';
import type { UploadResult } from './types';

export const DEFAULT_TAGS = ['shorts', 'ai', 'automation'];

// People & Blogs
const CATEGORY_ID = '22';

/** The slice of the YouTube videos resource this module calls. */
export interface YoutubeVideosApi {
  insert(params: youtube_v3.Params$Resource$Videos$Insert): Promise<{ data: youtube_v3.Schema$Video }>;
}

export function createYoutubeVideosApi(): YoutubeVideosApi | null {
  const { clientId, clientSecret, refreshToken } = config.youtube;
  if (!clientId || !clientSecret || !refreshToken) {
    return null;
  }

  const oauth2Client = new OAuth2Client(clientId, clientSecret);
  oauth2Client.setCredentials({ refresh_token: refreshToken });

  return google.youtube({ version: 'v3', auth: oauth2Client }).videos;
}

export async function uploadToYoutube(
  videoPath: string,
  title: string,
  description: string = '',
  tags: string[] = DEFAULT_TAGS,
  videos: YoutubeVideosApi | null = createYoutubeVideosApi()
): Promise<UploadResult> {
  if (!videos) {
    return {
      status: 'error',
      errorMessage:
        'YouTube API credentials not configured. Need YOUTUBE_CLIENT_ID, YOUTUBE_CLIENT_SECRET, YOUTUBE_REFRESH_TOKEN',
    };
  }
  if (!existsSync(videoPath)) {
    return { status: 'error', errorMessage: `Video file not found: ${videoPath}` };
  }

  const body = createReadStream(videoPath);
  try {
    const response = await videos.insert({
      part: ['snippet', 'status'],
      requestBody: {
        snippet: { title, description, tags, categoryId: CATEGORY_ID },
        status: { privacyStatus: 'public', selfDeclaredMadeForKids: false },
      },
      media: { mimeType: 'video/mp4', body },
    });

    const videoId = response.data.id;
    if (!videoId) {
      return { status: 'error', errorMessage: 'Error uploading to YouTube: no video id returned' };
    }

    return {
      status: 'success',
      message: 'Video uploaded successfully!',
      videoId,
      videoUrl: `https://www.youtube.com/watch?v=${videoId}`,
      title,
    };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.error('Error uploading to YouTube', { error: reason });
    return { status: 'error', errorMessage: `Error uploading to YouTube: ${reason}` };
  } finally {
    body.destroy();
  }
}
