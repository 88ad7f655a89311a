import logger from '../../utils/logger';
import { errorMessage } from '../models/errors';
import { compareStrings } from '../models/compare';
import {
  Album,
  Artist,
  ItemMapping,
  Track,
  VARIOUS_ARTISTS_ID,
  VARIOUS_ARTISTS_NAME,
  isItemMapping,
} from '../models/mediaItems';

/**
 * Anything able to resolve an external (MusicBrainz) artist id from a name.
 */
export interface ArtistIdLookup {
  findArtistId(name: string): Promise<string | undefined>;
}

/**
 * Best-effort enrichment run before an item enters the library.
 * Lookup failures are logged and never abort the add.
 */
export class MetadataController {
  constructor(private readonly lookup?: ArtistIdLookup) {}

  async enrichArtist(artist: Artist): Promise<Artist> {
    if (artist.externalId) return artist;
    const externalId = await this.resolveArtistId(artist.name);
    return externalId ? { ...artist, externalId } : artist;
  }

  /** Enriches the (full) artists credited on an album or track. */
  async enrichArtistRefs<T extends Album | Track>(item: T): Promise<T> {
    const artists: Array<Artist | ItemMapping> = [];
    for (const artist of item.artists) {
      artists.push(isItemMapping(artist) ? artist : await this.enrichArtist(artist));
    }
    return { ...item, artists };
  }

  private async resolveArtistId(name: string): Promise<string | undefined> {
    if (compareStrings(name, VARIOUS_ARTISTS_NAME, false)) return VARIOUS_ARTISTS_ID;
    if (!this.lookup) return undefined;
    try {
      const id = await this.lookup.findArtistId(name);
      if (id) logger.debug(`[MetadataController] Resolved MusicBrainz id for "${name}": ${id}`);
      return id;
    } catch (error) {
      logger.debug(`[MetadataController] MusicBrainz lookup failed for "${name}": ${errorMessage(error)}`);
      return undefined;
    }
  }
}
