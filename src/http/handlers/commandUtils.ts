import { MediaType } from '../../backend/models/mediaItems';
import { CommandError } from './commandTypes';

export function requireParam(params: URLSearchParams, name: string): string {
  const value = params.get(name);
  if (value === null || value.trim() === '') {
    throw new CommandError(400, `Missing required parameter "${name}"`);
  }
  return value.trim();
}

/**
 * Parse a potentially missing numeric parameter, falling back to the provided default.
 */
export function parseNumberParam(params: URLSearchParams, name: string, defaultValue: number): number {
  const raw = params.get(name);
  if (raw === null || raw === '') return defaultValue;
  const parsed = Number(raw);
  if (Number.isNaN(parsed)) throw new CommandError(400, `Parameter "${name}" must be a number`);
  return parsed;
}

export function parseBooleanParam(params: URLSearchParams, name: string): boolean | undefined {
  const raw = params.get(name);
  if (raw === null || raw === '') return undefined;
  if (['1', 'true', 'yes'].includes(raw.toLowerCase())) return true;
  if (['0', 'false', 'no'].includes(raw.toLowerCase())) return false;
  throw new CommandError(400, `Parameter "${name}" must be a boolean`);
}

/** Comma separated list parameter; missing means "not filtered". */
export function parseListParam(params: URLSearchParams, name: string): string[] | undefined {
  const raw = params.get(name);
  if (raw === null || raw.trim() === '') return undefined;
  return raw
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean);
}

export function parseMediaTypes(params: URLSearchParams, name = 'media_types'): MediaType[] | undefined {
  const list = parseListParam(params, name);
  if (!list) return undefined;
  return list.map((entry) => {
    const mediaType = Object.values(MediaType).find((candidate) => candidate === entry);
    if (!mediaType) throw new CommandError(400, `Unknown media type "${entry}"`);
    return mediaType;
  });
}

/**
 * Convenience helper for commands that rely on offset/limit pagination parameters.
 */
export function parsePaging(params: URLSearchParams, defaultLimit: number): { offset: number; limit: number } {
  const offset = parseNumberParam(params, 'offset', 0);
  const limit = parseNumberParam(params, 'limit', defaultLimit);
  return { offset, limit };
}
