import { describe, expect, it } from 'vitest';
import type { MasterPlaylist } from '@hls-ladder/core';
import { renderMasterPlaylist, renderSubtitlePlaylist } from './playlists.js';

const master: MasterPlaylist = {
  audio: [
    { type: 'audio', uri: 'audio_0/audio.m3u8', name: 'English', language: 'eng', isDefault: true },
    { type: 'audio', uri: 'audio_1/audio.m3u8', name: 'Español', language: 'spa', isDefault: false },
  ],
  subtitles: [
    { type: 'subtitle', uri: 'subtitle_0/subtitle.m3u8', name: 'Forced "signs"', language: 'eng' },
  ],
  video: [
    { type: 'video', uri: 'video_0/720p.m3u8', width: 1280, height: 720, bandwidth: 2500000 },
    { type: 'video', uri: 'video_0/240p.m3u8', width: 426, height: 240, bandwidth: 400000 },
  ],
};

describe('renderMasterPlaylist', () => {
  it('writes audio, subtitle and video sections in order', () => {
    expect(renderMasterPlaylist(master)).toBe(
      [
        '#EXTM3U',
        '#EXT-X-VERSION:3',
        '',
        '#EXT-X-MEDIA:TYPE=AUDIO,GROUP-ID="audio",NAME="English",LANGUAGE="eng",DEFAULT=YES,AUTOSELECT=YES,URI="audio_0/audio.m3u8"',
        '#EXT-X-MEDIA:TYPE=AUDIO,GROUP-ID="audio",NAME="Español",LANGUAGE="spa",DEFAULT=NO,AUTOSELECT=YES,URI="audio_1/audio.m3u8"',
        '#EXT-X-MEDIA:TYPE=SUBTITLES,GROUP-ID="subs",NAME="Forced \'signs\'",LANGUAGE="eng",DEFAULT=NO,AUTOSELECT=YES,URI="subtitle_0/subtitle.m3u8"',
        '',
        '#EXT-X-STREAM-INF:BANDWIDTH=2500000,RESOLUTION=1280x720,AUDIO="audio",SUBTITLES="subs"',
        'video_0/720p.m3u8',
        '#EXT-X-STREAM-INF:BANDWIDTH=400000,RESOLUTION=426x240,AUDIO="audio",SUBTITLES="subs"',
        'video_0/240p.m3u8',
        '',
      ].join('\n')
    );
  });

  it('omits group references for empty groups', () => {
    const text = renderMasterPlaylist({ ...master, subtitles: [] });

    expect(text).not.toContain('TYPE=SUBTITLES');
    expect(text.split('\n')).toContain('#EXT-X-STREAM-INF:BANDWIDTH=2500000,RESOLUTION=1280x720,AUDIO="audio"');
  });

  it('omits the resolution when the width was left to the encoder', () => {
    const text = renderMasterPlaylist({
      audio: [],
      subtitles: [],
      video: [{ type: 'video', uri: 'video_0/360p.m3u8', width: null, height: 360, bandwidth: 800000 }],
    });

    expect(text).toBe('#EXTM3U\n#EXT-X-VERSION:3\n\n\n#EXT-X-STREAM-INF:BANDWIDTH=800000\nvideo_0/360p.m3u8\n');
  });
});

describe('renderSubtitlePlaylist', () => {
  it('wraps the caption file in a single segment', () => {
    expect(renderSubtitlePlaylist('subtitle.vtt')).toBe(
      '#EXTM3U\n#EXT-X-VERSION:3\n#EXT-X-TARGETDURATION:10\n#EXT-X-MEDIA-SEQUENCE:0\n#EXTINF:10.0,\nsubtitle.vtt\n#EXT-X-ENDLIST\n'
    );
  });
});
