/**
 * Playlist Rendering
 *
 * Pure text builders for the HLS manifests this tool writes itself. Media
 * playlists for audio and video come straight from ffmpeg.
 */

import type {
  AudioRenditionResult,
  MasterPlaylist,
  SubtitleRenditionResult,
  VideoRenditionResult,
} from '@hls-ladder/core';

export const HLS_VERSION = 3;
export const AUDIO_GROUP_ID = 'audio';
export const SUBTITLE_GROUP_ID = 'subs';
export const MASTER_PLAYLIST_FILENAME = 'master.m3u8';

/** Whole-file duration declared for a single WebVTT caption segment */
const SUBTITLE_TARGET_DURATION = 10;

/**
 * Multivariant playlist: audio entries, subtitle entries, then one
 * STREAM-INF/URI pair per video rendition, each group in discovery order
 */
export function renderMasterPlaylist(master: MasterPlaylist): string {
  const lines = ['#EXTM3U', `#EXT-X-VERSION:${HLS_VERSION}`, ''];

  for (const audio of master.audio) {
    lines.push(audioMediaLine(audio));
  }
  for (const subtitle of master.subtitles) {
    lines.push(subtitleMediaLine(subtitle));
  }

  lines.push('');

  for (const video of master.video) {
    lines.push(streamInfLine(video, master), video.uri);
  }

  return lines.join('\n') + '\n';
}

export function renderSubtitlePlaylist(captionFilename: string): string {
  return [
    '#EXTM3U',
    `#EXT-X-VERSION:${HLS_VERSION}`,
    `#EXT-X-TARGETDURATION:${SUBTITLE_TARGET_DURATION}`,
    '#EXT-X-MEDIA-SEQUENCE:0',
    `#EXTINF:${SUBTITLE_TARGET_DURATION.toFixed(1)},`,
    captionFilename,
    '#EXT-X-ENDLIST',
    '',
  ].join('\n');
}

function audioMediaLine(audio: AudioRenditionResult): string {
  return '#EXT-X-MEDIA:' + [
    'TYPE=AUDIO',
    `GROUP-ID=${quoted(AUDIO_GROUP_ID)}`,
    `NAME=${quoted(audio.name)}`,
    `LANGUAGE=${quoted(audio.language)}`,
    `DEFAULT=${audio.isDefault ? 'YES' : 'NO'}`,
    'AUTOSELECT=YES',
    `URI=${quoted(audio.uri)}`,
  ].join(',');
}

function subtitleMediaLine(subtitle: SubtitleRenditionResult): string {
  return '#EXT-X-MEDIA:' + [
    'TYPE=SUBTITLES',
    `GROUP-ID=${quoted(SUBTITLE_GROUP_ID)}`,
    `NAME=${quoted(subtitle.name)}`,
    `LANGUAGE=${quoted(subtitle.language)}`,
    'DEFAULT=NO',
    'AUTOSELECT=YES',
    `URI=${quoted(subtitle.uri)}`,
  ].join(',');
}

function streamInfLine(video: VideoRenditionResult, master: MasterPlaylist): string {
  const attributes = [`BANDWIDTH=${video.bandwidth}`];

  // Without a known width the resolution cannot be declared
  if (video.width !== null) {
    attributes.push(`RESOLUTION=${video.width}x${video.height}`);
  }
  if (master.audio.length > 0) {
    attributes.push(`AUDIO=${quoted(AUDIO_GROUP_ID)}`);
  }
  if (master.subtitles.length > 0) {
    attributes.push(`SUBTITLES=${quoted(SUBTITLE_GROUP_ID)}`);
  }

  return `#EXT-X-STREAM-INF:${attributes.join(',')}`;
}

/**
 * Quoted-string attribute value; HLS forbids double quotes and line breaks inside
 */
function quoted(value: string): string {
  return `"${value.replace(/"/g, "'").replace(/[\r\n]+/g, ' ')}"`;
}
