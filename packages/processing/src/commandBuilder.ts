/**
 * FFmpeg Command Builder
 *
 * Fluent API for building ffmpeg argument lists for HLS renditions.
 */

export type VideoEncoder = 'libx264' | 'h264_nvenc';

export interface StreamMapping {
  inputIndex: number;
  streamSpec: string;     // e.g., 'v:0', 'a:1', 's:0'
}

export interface VideoCodecOptions {
  codec: VideoEncoder;
  preset?: string;
  bitrate?: string;
  maxrate?: string;
  bufsize?: string;
  pixFmt?: string;
  extraArgs?: string[];
}

export interface AudioCodecOptions {
  codec: 'aac';
  bitrate?: string;
}

export interface SubtitleOptions {
  codec: 'webvtt';
}

export interface HlsOptions {
  segmentDuration: number;   // -hls_time
  playlistType: 'vod' | 'event';
  segmentFilename: string;   // -hls_segment_filename pattern
}

export interface OutputOptions {
  format?: 'hls' | 'webvtt';
  hls?: HlsOptions;
}

export class FFmpegCommandBuilder {
  private inputs: string[] = [];
  private mappings: StreamMapping[] = [];
  private videoCodec: VideoCodecOptions | null = null;
  private audioCodec: AudioCodecOptions | null = null;
  private subtitleCodec: SubtitleOptions | null = null;
  private videoFilters: string[] = [];
  private outputOpts: OutputOptions = {};
  private outputFile: string = '';
  private globalArgs: string[] = [];

  /**
   * Add global arguments (before inputs)
   */
  addGlobalArg(...args: string[]): this {
    this.globalArgs.push(...args);
    return this;
  }

  /**
   * Add input file
   */
  addInput(file: string): this {
    this.inputs.push(file);
    return this;
  }

  /**
   * Map a stream from an input
   */
  map(inputIndex: number, streamSpec: string): this {
    this.mappings.push({ inputIndex, streamSpec });
    return this;
  }

  mapVideo(inputIndex: number, streamIndex: number): this {
    return this.map(inputIndex, `v:${streamIndex}`);
  }

  mapAudio(inputIndex: number, streamIndex: number): this {
    return this.map(inputIndex, `a:${streamIndex}`);
  }

  mapSubtitles(inputIndex: number, streamIndex: number): this {
    return this.map(inputIndex, `s:${streamIndex}`);
  }

  setVideoCodec(options: VideoCodecOptions): this {
    this.videoCodec = options;
    return this;
  }

  setAudioCodec(options: AudioCodecOptions): this {
    this.audioCodec = options;
    return this;
  }

  setSubtitleCodec(options: SubtitleOptions): this {
    this.subtitleCodec = options;
    return this;
  }

  /**
   * Add video filter; filters are chained in insertion order
   */
  addVideoFilter(filter: string): this {
    this.videoFilters.push(filter);
    return this;
  }

  setOutputOptions(options: OutputOptions): this {
    this.outputOpts = { ...this.outputOpts, ...options };
    return this;
  }

  setOutput(file: string): this {
    this.outputFile = file;
    return this;
  }

  /**
   * Build the command arguments array
   */
  build(): string[] {
    if (this.inputs.length === 0) {
      throw new Error('No input specified');
    }
    if (!this.outputFile) {
      throw new Error('No output file specified');
    }

    const args: string[] = [...this.globalArgs];

    for (const input of this.inputs) {
      args.push('-i', input);
    }

    for (const mapping of this.mappings) {
      args.push('-map', `${mapping.inputIndex}:${mapping.streamSpec}`);
    }

    if (this.videoCodec) {
      args.push('-c:v', this.videoCodec.codec);
      if (this.videoCodec.preset) args.push('-preset', this.videoCodec.preset);
      if (this.videoCodec.bitrate) args.push('-b:v', this.videoCodec.bitrate);
      if (this.videoCodec.maxrate) args.push('-maxrate', this.videoCodec.maxrate);
      if (this.videoCodec.bufsize) args.push('-bufsize', this.videoCodec.bufsize);
      if (this.videoCodec.pixFmt) args.push('-pix_fmt', this.videoCodec.pixFmt);
      if (this.videoCodec.extraArgs) args.push(...this.videoCodec.extraArgs);
    }

    if (this.videoFilters.length > 0) {
      args.push('-vf', this.videoFilters.join(','));
    }

    if (this.audioCodec) {
      args.push('-c:a', this.audioCodec.codec);
      if (this.audioCodec.bitrate) args.push('-b:a', this.audioCodec.bitrate);
    }

    if (this.subtitleCodec) {
      args.push('-c:s', this.subtitleCodec.codec);
    }

    if (this.outputOpts.format) {
      args.push('-f', this.outputOpts.format);
    }
    if (this.outputOpts.hls) {
      const hls = this.outputOpts.hls;
      args.push(
        '-hls_time', hls.segmentDuration.toString(),
        '-hls_playlist_type', hls.playlistType,
        '-hls_segment_filename', hls.segmentFilename
      );
    }

    args.push(this.outputFile);

    return args;
  }
}
