/**
 * Timing offsets applied to the speech track when combining streams.
 */
export interface MuxOptions {
    /** Silence inserted before speech onset, in seconds */
    audioLeadDelaySeconds: number;
    /** Silence appended after the speech track, in seconds */
    audioTailPadSeconds: number;
}

/**
 * IMuxer - Port for combining a video stream with a separately produced audio stream.
 * Implementations: FFmpegMuxer
 */
export interface IMuxer {
    /**
     * `audioFormat` is the speech synthesizer's output format (e.g. `mp3_44100_64`, `pcm_16000`);
     * headerless formats cannot be probed and need it to be decoded.
     */
    mux(videoBytes: Buffer, audioBytes: Buffer, audioFormat: string, options: MuxOptions): Promise<Buffer>;
}
