/**
 * Playlist Assembler
 *
 * Writes the subtitle wrapper playlists and the master playlist. Write
 * failures are returned to the caller, which decides how serious they are.
 */

import { join } from 'node:path';
import { ManifestWriteError, errorMessage, type MasterPlaylist } from '@hls-ladder/core';
import { safeWriteFile, type Logger } from '@hls-ladder/utils';
import { MASTER_PLAYLIST_FILENAME, renderMasterPlaylist, renderSubtitlePlaylist } from './playlists.js';

export interface ManifestWriteResult {
  success: boolean;
  path: string;
  error?: ManifestWriteError;
}

export class PlaylistAssembler {
  constructor(private readonly logger: Logger) {}

  /**
   * Wrap a WebVTT file in a single-segment media playlist
   */
  async writeSubtitlePlaylist(playlistPath: string, captionFilename: string): Promise<ManifestWriteResult> {
    return this.write(playlistPath, renderSubtitlePlaylist(captionFilename));
  }

  async writeMasterPlaylist(outputRoot: string, master: MasterPlaylist): Promise<ManifestWriteResult> {
    const path = join(outputRoot, MASTER_PLAYLIST_FILENAME);
    const result = await this.write(path, renderMasterPlaylist(master));

    if (result.success) {
      this.logger.info(
        {
          path,
          audio: master.audio.length,
          subtitles: master.subtitles.length,
          video: master.video.length,
        },
        'Master playlist written'
      );
    }

    return result;
  }

  private async write(path: string, content: string): Promise<ManifestWriteResult> {
    try {
      await safeWriteFile(path, content);
      this.logger.debug({ path }, 'Playlist written');
      return { success: true, path };
    } catch (error) {
      return { success: false, path, error: new ManifestWriteError(path, errorMessage(error)) };
    }
  }
}
