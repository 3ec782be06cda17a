/**
 * YouTube Data API v3 video provider
 *
 * Turns a video id into a VideoRecord. Only the video lookup itself is
 * fatal; comments and channel info degrade to empty/absent with a warning.
 * Transcripts and thumbnail colour analysis are not fetched.
 */

import { z } from 'zod';
import { VideoRecordSchema } from './schema.js';
import type { VideoRecord } from './schema.js';
import { AuthError, NotFoundError, RateLimitedError, ScoringError, TransientError } from './errors.js';
import { parseIsoDuration } from './video-url.js';
import { logger } from './logger.js';
import { CONFIG } from './config.js';

const YOUTUBE_API_BASE = 'https://www.googleapis.com/youtube/v3';

const log = logger.child('youtube');

export interface VideoDataProvider {
  fetchVideo(videoId: string): Promise<VideoRecord>;
}

export type FetchLike = (input: string, init?: { headers?: Record<string, string> }) => Promise<Response>;

export interface YouTubeProviderOptions {
  apiKey?: string;
  commentLimit?: number;
  fetch?: FetchLike;
  baseUrl?: string;
}

// ============================================================================
// Response Schemas
// ============================================================================

const CountSchema = z.coerce.number().int().min(0).default(0);

const VideoItemSchema = z.object({
  id: z.string(),
  snippet: z.object({
    title: z.string(),
    description: z.string().default(''),
    publishedAt: z.string(),
    channelId: z.string().optional(),
    channelTitle: z.string().default(''),
    tags: z.array(z.string()).default([]),
  }),
  statistics: z
    .object({
      viewCount: CountSchema,
      likeCount: CountSchema,
      commentCount: CountSchema,
    })
    .default({}),
  contentDetails: z.object({
    duration: z.string(),
  }),
});

const VideoListSchema = z.object({
  items: z.array(VideoItemSchema).default([]),
});

const CommentThreadListSchema = z.object({
  items: z
    .array(
      z.object({
        snippet: z.object({
          topLevelComment: z.object({
            snippet: z.object({
              textDisplay: z.string(),
              textOriginal: z.string().optional(),
            }),
          }),
        }),
      })
    )
    .default([]),
});

const ChannelListSchema = z.object({
  items: z
    .array(
      z.object({
        snippet: z.object({ description: z.string().default('') }).default({}),
        statistics: z
          .object({
            subscriberCount: CountSchema,
            videoCount: CountSchema,
          })
          .default({}),
      })
    )
    .default([]),
});

const ApiErrorSchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().default(''),
    errors: z.array(z.object({ reason: z.string().optional() })).default([]),
  }),
});

// ============================================================================
// Provider
// ============================================================================

export class YouTubeDataProvider implements VideoDataProvider {
  private readonly apiKey: string;
  private readonly commentLimit: number;
  private readonly fetchFn: FetchLike;
  private readonly baseUrl: string;

  constructor(options: YouTubeProviderOptions = {}) {
    const apiKey = options.apiKey ?? CONFIG.youtube.apiKey;
    if (!apiKey) {
      throw new AuthError('YOUTUBE_API_KEY not configured. Add it to your .env file.');
    }
    this.apiKey = apiKey;
    this.commentLimit = options.commentLimit ?? CONFIG.youtube.commentLimit;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.baseUrl = options.baseUrl ?? YOUTUBE_API_BASE;
  }

  async fetchVideo(videoId: string): Promise<VideoRecord> {
    const list = await this.request('videos', VideoListSchema, {
      part: 'snippet,statistics,contentDetails',
      id: videoId,
    });

    const item = list.items[0];
    if (!item) {
      throw new NotFoundError('Video', videoId);
    }

    const [comments, channelInfo] = await Promise.all([
      this.fetchComments(videoId),
      item.snippet.channelId ? this.fetchChannel(item.snippet.channelId) : Promise.resolve(undefined),
    ]);

    return VideoRecordSchema.parse({
      videoId,
      title: item.snippet.title,
      description: item.snippet.description,
      tags: item.snippet.tags,
      viewCount: item.statistics.viewCount,
      likeCount: item.statistics.likeCount,
      commentCount: item.statistics.commentCount,
      durationSeconds: parseIsoDuration(item.contentDetails.duration),
      publishedAt: item.snippet.publishedAt,
      channelTitle: item.snippet.channelTitle,
      comments,
      channelInfo,
    });
  }

  private async fetchComments(videoId: string): Promise<string[]> {
    try {
      const threads = await this.request('commentThreads', CommentThreadListSchema, {
        part: 'snippet',
        videoId,
        maxResults: String(this.commentLimit),
        order: 'relevance',
        textFormat: 'plainText',
      });
      return threads.items.map(t => {
        const s = t.snippet.topLevelComment.snippet;
        return s.textOriginal ?? s.textDisplay;
      });
    } catch (error) {
      // Comments disabled or quota hiccup: score without them
      log.warn('Comment retrieval failed; continuing without comments', { videoId, reason: describe(error) });
      return [];
    }
  }

  private async fetchChannel(channelId: string): Promise<VideoRecord['channelInfo']> {
    try {
      const channels = await this.request('channels', ChannelListSchema, {
        part: 'snippet,statistics',
        id: channelId,
      });
      const channel = channels.items[0];
      if (!channel) return undefined;
      return {
        subscriberCount: channel.statistics.subscriberCount,
        videoCount: channel.statistics.videoCount,
        description: channel.snippet.description,
      };
    } catch (error) {
      log.warn('Channel retrieval failed; continuing without channel info', { channelId, reason: describe(error) });
      return undefined;
    }
  }

  private async request<T extends z.ZodTypeAny>(
    endpoint: string,
    schema: T,
    params: Record<string, string>
  ): Promise<z.infer<T>> {
    const url = new URL(`${this.baseUrl}/${endpoint}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.append(key, value);
    }
    url.searchParams.append('key', this.apiKey);

    let response: Response;
    try {
      response = await this.fetchFn(url.toString(), { headers: { Accept: 'application/json' } });
    } catch (error) {
      throw new TransientError(`Network error calling ${endpoint}`, { cause: describe(error) });
    }

    const body: unknown = await response.json().catch(() => undefined);

    if (!response.ok) {
      throw toProviderError(endpoint, response.status, body, params.id ?? params.videoId);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new TransientError(`Unexpected ${endpoint} response shape`, parsed.error.issues);
    }
    return parsed.data;
  }
}

// ============================================================================
// Error Mapping
// ============================================================================

export function toProviderError(
  endpoint: string,
  status: number,
  body: unknown,
  identifier?: string
): ScoringError {
  const apiError = ApiErrorSchema.safeParse(body);
  const message = apiError.success && apiError.data.error.message ? apiError.data.error.message : `HTTP ${status}`;
  const reasons = apiError.success ? apiError.data.error.errors.map(e => e.reason) : [];
  const details = { endpoint, status, reasons };

  if (status === 429 || reasons.includes('quotaExceeded') || reasons.includes('rateLimitExceeded')) {
    return new RateLimitedError(`YouTube API quota exceeded: ${message}`, details);
  }
  if (status === 401 || status === 403) {
    return new AuthError(`YouTube API rejected the key: ${message}`, details);
  }
  if (status === 404) {
    return new NotFoundError(endpoint, identifier);
  }
  return new TransientError(`YouTube API error: ${message}`, details);
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
