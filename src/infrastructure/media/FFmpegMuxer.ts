import ffmpeg from 'fluent-ffmpeg';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { IMuxer, MuxOptions } from '../../domain/ports/IMuxer';
import { MuxFailedError, describeError } from '../../domain/errors/GenerationErrors';

/**
 * Audio filter chain for the speech track: lead delay then optional tail padding.
 */
export function buildAudioFilters(options: MuxOptions): string[] {
    const filters: string[] = [];
    const delayMs = Math.round(Math.max(0, options.audioLeadDelaySeconds) * 1000);
    if (delayMs > 0) {
        filters.push(`adelay=${delayMs}:all=1`);
    }
    const padSeconds = Math.max(0, options.audioTailPadSeconds);
    if (padSeconds > 0) {
        filters.push(`apad=pad_dur=${padSeconds}`);
    }
    return filters;
}

const RAW_AUDIO_FORMATS: Record<string, string> = {
    pcm: 's16le',
    ulaw: 'mulaw',
};

/**
 * Input options for headerless speech tracks (raw PCM, mu-law). Container formats need none.
 */
export function audioInputOptions(audioFormat: string): string[] {
    const match = /^(pcm|ulaw)_(\d+)$/.exec(audioFormat);
    if (!match) {
        return [];
    }
    return [`-f ${RAW_AUDIO_FORMATS[match[1]]}`, `-ar ${match[2]}`, '-ac 1'];
}

/**
 * Combines a generated clip with a speech track using a local ffmpeg binary.
 * Video is stream-copied; audio is encoded to AAC; output stops at the shorter stream.
 */
export class FFmpegMuxer implements IMuxer {
    constructor(private readonly ffmpegPath?: string) { }

    async mux(videoBytes: Buffer, audioBytes: Buffer, audioFormat: string, options: MuxOptions): Promise<Buffer> {
        if (videoBytes.byteLength === 0 || audioBytes.byteLength === 0) {
            throw new MuxFailedError('empty input stream');
        }

        const workDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'clip-mux-'));
        const videoPath = path.join(workDir, 'video.mp4');
        const audioPath = path.join(workDir, 'audio.bin');
        const outputPath = path.join(workDir, 'final.mp4');

        try {
            await fs.promises.writeFile(videoPath, videoBytes);
            await fs.promises.writeFile(audioPath, audioBytes);

            console.log(`[FFmpeg] Muxing video (${videoBytes.byteLength} bytes) with ${audioFormat} audio (${audioBytes.byteLength} bytes), lead ${options.audioLeadDelaySeconds}s, tail ${options.audioTailPadSeconds}s`);
            await this.run(videoPath, audioPath, outputPath, audioInputOptions(audioFormat), options);

            const output = await fs.promises.readFile(outputPath);
            if (output.byteLength === 0) {
                throw new MuxFailedError('ffmpeg produced an empty file');
            }
            return output;
        } catch (error) {
            if (error instanceof MuxFailedError) {
                throw error;
            }
            throw new MuxFailedError(describeError(error));
        } finally {
            try {
                await fs.promises.rm(workDir, { recursive: true, force: true });
            } catch (cleanupError) {
                console.warn(`[FFmpeg] Failed to cleanup temp dir ${workDir}`, cleanupError);
            }
        }
    }

    private run(
        videoPath: string,
        audioPath: string,
        outputPath: string,
        audioOptions: string[],
        options: MuxOptions
    ): Promise<void> {
        return new Promise((resolve, reject) => {
            const cmd = ffmpeg();
            if (this.ffmpegPath) {
                cmd.setFfmpegPath(this.ffmpegPath);
            }

            cmd.input(videoPath);
            cmd.input(audioPath);
            if (audioOptions.length > 0) {
                cmd.inputOptions(audioOptions);
            }

            const audioFilters = buildAudioFilters(options);
            if (audioFilters.length > 0) {
                cmd.audioFilters(audioFilters);
            }

            cmd.outputOptions([
                '-map 0:v:0',
                '-map 1:a:0',
                '-c:v copy',
                '-c:a aac',
                '-b:a 192k',
                '-shortest',
                '-movflags +faststart',
            ])
                .on('end', () => resolve())
                .on('error', (err: Error, _stdout: string | null, stderr: string | null) => {
                    const tail = stderr ? stderr.split('\n').slice(-5).join('\n') : '';
                    reject(new MuxFailedError(tail ? `${err.message}\n${tail}` : err.message));
                })
                .save(outputPath);
        });
    }
}
