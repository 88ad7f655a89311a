import { z } from 'zod';
import logger from '../../utils/logger';
import type { MusicController } from '../../backend/music/musicController';
import type { MediaControllerBase } from '../../backend/music/base';
import {
  LIBRARY_PROVIDER,
  MediaItem,
  albumSchema,
  artistSchema,
  playlistSchema,
  trackSchema,
} from '../../backend/models/mediaItems';
import { CommandError, CommandRequest, CommandResult, commandResponse } from './commandTypes';
import {
  parseBooleanParam,
  parseListParam,
  parseMediaTypes,
  parseNumberParam,
  parsePaging,
  requireParam,
} from './commandUtils';

/**
 * Central dispatcher translating API commands (`music/artist/get`, `music/sync`...) into controller calls.
 */

/**
 * Handler contract returning the command payload.
 */
type HandlerFn = (request: CommandRequest) => Promise<unknown>;

interface Route {
  test: (command: string) => boolean;
  handler: HandlerFn;
}

export type CommandHandler = (request: CommandRequest) => Promise<CommandResult>;

const DEFAULT_PAGE_SIZE = 500;

/**
 * Builds the route table for one music controller and returns the dispatcher.
 */
export function createRequestHandler(music: MusicController): CommandHandler {
  const routes: Route[] = [];

  /** Route helper matching one exact command. */
  const exactRoute = (command: string, handler: HandlerFn): void => {
    routes.push({ test: (candidate) => candidate === command, handler });
  };

  /**
   * The operations every media type shares, bound to one controller and its item schema.
   */
  function mediaRoutes<T extends MediaItem>(
    controller: MediaControllerBase<T>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): void {
    const type = controller.mediaType;

    exactRoute(`music/${type}s/library_items`, ({ params }) => {
      const { offset, limit } = parsePaging(params, DEFAULT_PAGE_SIZE);
      return controller.libraryItems({
        inLibrary: parseBooleanParam(params, 'in_library'),
        search: params.get('search') ?? undefined,
        orderBy: params.get('order_by') ?? undefined,
        limit,
        offset,
      });
    });

    exactRoute(`music/${type}/get`, ({ params }) =>
      controller.get(requireParam(params, 'item_id'), params.get('provider') ?? LIBRARY_PROVIDER, {
        addToLibrary: parseBooleanParam(params, 'add_to_library'),
        forceRefresh: parseBooleanParam(params, 'force_refresh'),
      }),
    );

    exactRoute(`music/${type}/search`, ({ params }) =>
      controller.search(
        requireParam(params, 'query'),
        params.get('provider') ?? LIBRARY_PROVIDER,
        parseNumberParam(params, 'limit', 25),
      ),
    );

    exactRoute(`music/${type}/add`, ({ params, body }) =>
      controller.add(schema.parse(body), {
        matchProviders: parseBooleanParam(params, 'match_providers'),
        concurrency: parseNumberParam(params, 'concurrency', music.matching.concurrency),
      }),
    );

    exactRoute(`music/${type}/update`, ({ params, body }) =>
      controller.update(requireParam(params, 'item_id'), schema.parse(body), {
        overwrite: parseBooleanParam(params, 'overwrite'),
      }),
    );

    exactRoute(`music/${type}/delete`, async ({ params }) => {
      const itemId = requireParam(params, 'item_id');
      await controller.delete(itemId, { recursive: parseBooleanParam(params, 'recursive') });
      return { deleted: itemId };
    });

    exactRoute(`music/${type}/match`, async ({ params }) => {
      const item = await controller.getLibraryItem(requireParam(params, 'item_id'));
      return controller.match(item, { concurrency: parseNumberParam(params, 'concurrency', music.matching.concurrency) });
    });

    exactRoute(`music/${type}/in_library`, ({ params }) => {
      const value = parseBooleanParam(params, 'value');
      if (value === undefined) throw new CommandError(400, 'Missing required parameter "value"');
      return controller.setInLibrary(requireParam(params, 'item_id'), value);
    });
  }

  mediaRoutes(music.artists, artistSchema);
  mediaRoutes(music.albums, albumSchema);
  mediaRoutes(music.tracks, trackSchema);
  mediaRoutes(music.playlists, playlistSchema);

  exactRoute('music/artist/albums', async ({ params }) => {
    const artist = await music.artists.get(requireParam(params, 'item_id'), params.get('provider') ?? LIBRARY_PROVIDER);
    return music.artists.albums(artist);
  });
  exactRoute('music/artist/tracks', async ({ params }) => {
    const artist = await music.artists.get(requireParam(params, 'item_id'), params.get('provider') ?? LIBRARY_PROVIDER);
    return music.artists.tracks(artist);
  });
  exactRoute('music/artist/dynamic_tracks', async ({ params }) => {
    const artist = await music.artists.get(requireParam(params, 'item_id'), params.get('provider') ?? LIBRARY_PROVIDER);
    return music.artists.dynamicTracks(artist, parseNumberParam(params, 'limit', 25));
  });
  exactRoute('music/albumartists', ({ params }) => {
    const { offset, limit } = parsePaging(params, DEFAULT_PAGE_SIZE);
    return music.artists.albumArtists({ inLibrary: parseBooleanParam(params, 'in_library'), limit, offset });
  });
  exactRoute('music/album/tracks', async ({ params }) => {
    const album = await music.albums.get(requireParam(params, 'item_id'), params.get('provider') ?? LIBRARY_PROVIDER);
    return music.albums.tracks(album);
  });
  exactRoute('music/playlist/tracks', async ({ params }) => {
    const playlist = await music.playlists.get(requireParam(params, 'item_id'), params.get('provider') ?? LIBRARY_PROVIDER);
    return music.playlists.tracks(playlist);
  });
  exactRoute('music/search', async ({ params }) =>
    music.search(requireParam(params, 'query'), {
      providers: parseListParam(params, 'providers'),
      mediaTypes: parseMediaTypes(params),
      limit: parseNumberParam(params, 'limit', 25),
    }),
  );
  exactRoute('music/sync', async ({ params }) =>
    music.startSync({
      providers: parseListParam(params, 'providers'),
      mediaTypes: parseMediaTypes(params),
      concurrency: parseNumberParam(params, 'concurrency', music.matching.concurrency),
    }),
  );
  exactRoute('music/synctasks', async () => music.syncTasks());
  exactRoute('music/sync/cancel', async ({ params }) => {
    const id = requireParam(params, 'id');
    await music.cancelSync(id);
    return { cancelled: id };
  });

  return async (request: CommandRequest): Promise<CommandResult> => {
    const command = request.command.trim().replace(/^\/+|\/+$/g, '');
    const route = routes.find((candidate) => candidate.test(command));
    if (!route) {
      logger.info(`[RequestHandler] Request not processed: ${command || '(empty)'}`);
      throw new CommandError(404, `Unknown command "${command}"`);
    }
    logger.debug(`[RequestHandler] Handling ${command}`);
    return commandResponse(command, await route.handler({ ...request, command }));
  };
}
