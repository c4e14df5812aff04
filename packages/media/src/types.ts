/**
 * Media Types
 *
 * Source container model produced from a probe. Read-only downstream.
 */

export type StreamType = 'video' | 'audio' | 'subtitle' | 'other';

export interface SourceStream {
  /** Absolute position within the container */
  index: number;
  type: StreamType;
  /** Codec type as reported by the prober, kept for logging */
  rawType: string;
  codecName?: string;

  // Video only
  width?: number;
  height?: number;

  // Tags
  language?: string;
  title?: string;

  /** Disposition `default` flag; false when absent */
  isDefault: boolean;
}

export interface SourceContainer {
  filePath: string;
  /** Seconds; undefined when the prober did not report a usable duration */
  duration?: number;
  streams: ReadonlyArray<SourceStream>;
}

export type TrackKind = Exclude<StreamType, 'other'>;

/**
 * A stream with its position among streams of the same type
 */
export interface ClassifiedTrack {
  type: TrackKind;
  /** Dense, zero-based, counted per type (matches ffmpeg's `0:v:N` selectors) */
  trackIndex: number;
  stream: SourceStream;
  /** Title tag, else language tag, else `<Type>_<index>` */
  displayName: string;
  /** Language tag, else `und` */
  language: string;
}

export interface TrackCollection {
  video: ClassifiedTrack[];
  audio: ClassifiedTrack[];
  subtitle: ClassifiedTrack[];
}
