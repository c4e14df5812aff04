/**
 * @hls-ladder/packaging
 *
 * HLS manifest rendering and assembly.
 */

export {
  renderMasterPlaylist,
  renderSubtitlePlaylist,
  HLS_VERSION,
  AUDIO_GROUP_ID,
  SUBTITLE_GROUP_ID,
  MASTER_PLAYLIST_FILENAME,
} from './playlists.js';

export {
  PlaylistAssembler,
  type ManifestWriteResult,
} from './playlistAssembler.js';
