import { Injectable, Logger } from '@nestjs/common';
import { WorkflowSettings } from '@platform/application/workflow-settings';
import { DependencyFailureError } from '@platform/application/errors';
import { VideoDescriptor, VideoSync } from '../application/ports/video-sync';

const YOUTUBE_HOSTS = new Set([
  'youtube.com',
  'www.youtube.com',
  'm.youtube.com',
  'youtu.be',
]);

const VIDEO_ID = /^[A-Za-z0-9_-]{6,}$/;

const parseUrl = (value: string): URL | null => {
  try {
    return new URL(value.trim());
  } catch {
    return null;
  }
};

export const youtubeVideoId = (value: string): string | null => {
  const url = parseUrl(value);
  if (!url || !YOUTUBE_HOSTS.has(url.hostname)) return null;

  let candidate: string | null = null;
  if (url.hostname === 'youtu.be') {
    candidate = url.pathname.slice(1);
  } else if (url.pathname === '/watch') {
    candidate = url.searchParams.get('v');
  } else if (url.pathname.startsWith('/embed/')) {
    candidate = url.pathname.slice('/embed/'.length);
  }
  return candidate && VIDEO_ID.test(candidate) ? candidate : null;
};

const videoTitle = (video: VideoDescriptor): string =>
  video.displayName ? `${video.title} (${video.displayName})` : video.title;

const videoDescription = (video: VideoDescriptor): string => {
  const lines = [videoTitle(video), ''];
  if (video.description) {
    lines.push(video.description.trim(), '');
  }
  lines.push(
    `Publication #${video.publicationId}, published ${video.publishedAt.toISOString().slice(0, 10)}.`,
    `Authors: ${video.authorNames.join(', ')}`
  );
  if (video.obsoletedById !== null) {
    lines.push(
      `This publication has been obsoleted by publication #${video.obsoletedById}.`
    );
  }
  return lines.join('\n');
};

/** Updates the snippet of YouTube-hosted encodes through the Data API. */
@Injectable()
export class YouTubeVideoSync extends VideoSync {
  private readonly logger = new Logger(YouTubeVideoSync.name);

  constructor(private readonly settings: WorkflowSettings) {
    super();
  }

  isRecognizedUrl(url: string): boolean {
    return youtubeVideoId(url) !== null;
  }

  convertToEmbedLink(url: string): string {
    const id = youtubeVideoId(url);
    return id ? `https://www.youtube.com/embed/${id}` : url;
  }

  async sync(video: VideoDescriptor): Promise<void> {
    const id = youtubeVideoId(video.url);
    if (!id) {
      this.logger.debug(`Not a YouTube url, nothing to sync: ${video.url}`);
      return;
    }

    const token = this.settings.youtubeAccessToken;
    if (!token) {
      this.logger.warn(
        `YOUTUBE_ACCESS_TOKEN is not configured; skipping sync of video ${id}`
      );
      return;
    }

    const endpoint = new URL(
      `${this.settings.youtubeApiUrl.replace(/\/$/, '')}/videos`
    );
    endpoint.searchParams.set('part', 'snippet');

    const response = await fetch(endpoint, {
      method: 'PUT',
      headers: {
        authorization: `Bearer ${token}`,
        'content-type': 'application/json',
        accept: 'application/json',
      },
      body: JSON.stringify({
        id,
        snippet: {
          title: videoTitle(video).slice(0, 100),
          description: videoDescription(video),
          categoryId: '20',
          tags: [video.systemCode, video.gameDisplayName],
        },
      }),
    });

    if (!response.ok) {
      throw new DependencyFailureError(
        `YouTube sync of video ${id} failed (status ${response.status})`
      );
    }
  }
}
