/**
 * Rendition Types
 *
 * Results of successful encode jobs, consumed by playlist assembly.
 */

export type TrackType = 'video' | 'audio' | 'subtitle';

export interface VideoRenditionResult {
  type: 'video';
  /** Playlist URI relative to the output root */
  uri: string;
  /** Pixel width, or null when the encoder derived it from the height */
  width: number | null;
  height: number;
  /** Bits per second */
  bandwidth: number;
}

export interface AudioRenditionResult {
  type: 'audio';
  uri: string;
  name: string;
  language: string;
  isDefault: boolean;
}

export interface SubtitleRenditionResult {
  type: 'subtitle';
  uri: string;
  name: string;
  language: string;
}

export type RenditionResult =
  | VideoRenditionResult
  | AudioRenditionResult
  | SubtitleRenditionResult;

/**
 * Everything the multivariant playlist declares, in discovery order
 */
export interface MasterPlaylist {
  audio: AudioRenditionResult[];
  subtitles: SubtitleRenditionResult[];
  video: VideoRenditionResult[];
}
