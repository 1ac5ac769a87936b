import { isRecord, readInteger, readOptionalString, readString } from './util/values.js';

/** Well-known HEOS source ids. */
export enum SourceId {
  Pandora = 1,
  Rhapsody = 2,
  TuneIn = 3,
  Spotify = 4,
  Deezer = 5,
  Napster = 6,
  IHeartRadio = 7,
  SiriusXM = 8,
  Soundcloud = 9,
  Tidal = 10,
  AmazonMusic = 13,
  LocalMedia = 1024,
  Playlists = 1025,
  History = 1026,
  AuxInput = 1027,
  Favorites = 1028,
}

export interface MusicSource {
  readonly id: number;
  readonly name: string;
  /** `music_service`, `heos_server`, `heos_service`, ... */
  readonly type: string;
  readonly available: boolean;
  readonly imageUrl: string | null;
  readonly serviceUsername: string | null;
}

export interface MediaItem {
  readonly sourceId: number;
  /** Container that was browsed to find this item; null at a source's root */
  readonly parentId: string | null;
  readonly name: string;
  readonly type: string;
  readonly playable: boolean;
  readonly browsable: boolean;
  readonly containerId: string | null;
  readonly mediaId: string | null;
  readonly imageUrl: string | null;
  readonly artist: string | null;
  readonly album: string | null;
}

export interface BrowseResult {
  readonly sourceId: number;
  readonly containerId: string | null;
  readonly returned: number;
  readonly total: number;
  readonly items: readonly MediaItem[];
}

export function parseMusicSources(payload: unknown): MusicSource[] {
  if (!Array.isArray(payload)) return [];
  const sources: MusicSource[] = [];
  for (const entry of payload) {
    if (!isRecord(entry)) continue;
    const id = readInteger(entry, 'sid');
    if (id === null) continue;
    sources.push({
      id,
      name: readString(entry, 'name', `Source ${id}`),
      type: readString(entry, 'type', 'unknown'),
      available: entry.available === 'true' || entry.available === true,
      imageUrl: readOptionalString(entry, 'image_url'),
      serviceUsername: readOptionalString(entry, 'service_username'),
    });
  }
  return sources;
}

export function parseMediaItem(value: unknown, sourceId: number, parentId: string | null): MediaItem | null {
  if (!isRecord(value)) return null;
  const name = readString(value, 'name');
  if (!name) return null;
  const containerId = readOptionalString(value, 'cid');
  return {
    sourceId: readInteger(value, 'sid') ?? sourceId,
    parentId,
    name,
    type: readString(value, 'type', 'unknown'),
    playable: value.playable === 'yes',
    browsable: value.container === 'yes' || value.type === 'heos_service' || value.type === 'heos_server',
    containerId,
    mediaId: readOptionalString(value, 'mid'),
    imageUrl: readOptionalString(value, 'image_url'),
    artist: readOptionalString(value, 'artist'),
    album: readOptionalString(value, 'album'),
  };
}

export function parseBrowseResult(
  payload: unknown,
  attributes: Readonly<Record<string, string>>,
  sourceId: number,
  containerId: string | null,
): BrowseResult {
  const items: MediaItem[] = [];
  if (Array.isArray(payload)) {
    for (const entry of payload) {
      const item = parseMediaItem(entry, sourceId, containerId);
      if (item) items.push(item);
    }
  }
  const returned = Number.parseInt(attributes.returned ?? '', 10);
  const total = Number.parseInt(attributes.count ?? '', 10);
  return {
    sourceId,
    containerId,
    returned: Number.isNaN(returned) ? items.length : returned,
    total: Number.isNaN(total) ? items.length : total,
    items,
  };
}
