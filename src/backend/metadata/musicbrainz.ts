import axios, { AxiosInstance } from 'axios';
import PQueue from 'p-queue';
import { z } from 'zod';
import logger from '../../utils/logger';
import { compareStrings } from '../models/compare';

const artistSearchSchema = z.object({
  artists: z
    .array(
      z.object({
        id: z.string(),
        name: z.string(),
        score: z.number().optional(),
      }),
    )
    .default([]),
});

export interface MusicBrainzClientOptions {
  baseUrl: string;
  userAgent: string;
  /** Injected in tests. */
  http?: AxiosInstance;
}

/**
 * Minimal MusicBrainz client. MusicBrainz allows one request per second per client, so every call
 * goes through a single-slot interval queue.
 */
export class MusicBrainzClient {
  private readonly http: AxiosInstance;
  private readonly queue = new PQueue({ concurrency: 1, intervalCap: 1, interval: 1100 });

  constructor(options: MusicBrainzClientOptions) {
    this.http =
      options.http ??
      axios.create({
        baseURL: options.baseUrl,
        timeout: 10000,
        headers: { 'User-Agent': options.userAgent, Accept: 'application/json' },
      });
  }

  /**
   * Find the MusicBrainz id for an artist name. Only an exact (sort-name equal) top-score hit counts.
   */
  async findArtistId(name: string): Promise<string | undefined> {
    const response = await this.queue.add(() =>
      this.http.get('/artist', {
        params: { query: `artist:"${name.replace(/"/g, '')}"`, fmt: 'json', limit: 5 },
      }),
    );
    const parsed = artistSearchSchema.safeParse(response.data);
    if (!parsed.success) {
      logger.warn(`[MusicBrainz] Unexpected artist search payload for "${name}"`);
      return undefined;
    }
    const hit = parsed.data.artists.find((artist) => (artist.score ?? 0) >= 100 && compareStrings(artist.name, name));
    return hit?.id;
  }
}
