/**
 * Largest speech track accepted downstream (talking-head providers cap inputs near 10 MB).
 */
export const MAX_AUDIO_BYTES = 9_500_000;

/**
 * Synthesized speech held in memory until it is uploaded.
 */
export interface SpeechArtifact {
    bytes: Buffer;
    /** Always an audio/* type */
    contentType: string;
    sizeBytes: number;
}

/**
 * An object that has been durably uploaded and is publicly retrievable.
 */
export interface StoredArtifact {
    publicUrl: string;
    storagePath: string;
    contentType: string;
}

/**
 * What a successful workflow hands back to the caller.
 * finalUrl equals videoUrl whenever no muxing took place.
 */
export interface GenerationResult {
    audioUrl?: string;
    videoUrl: string;
    finalUrl: string;
}

/**
 * Request fields copied into the persisted record alongside the result.
 */
export interface RecordDetails {
    userId?: string;
    imageUrl: string;
    prompt: string;
    script?: string;
    voiceId?: string;
    resolution: string;
    durationSeconds: number;
    /** Storage path of the artifact behind finalUrl, when this service owns it */
    storageKey?: string;
}

export function createSpeechArtifact(bytes: Buffer, contentType: string): SpeechArtifact {
    return {
        bytes,
        contentType,
        sizeBytes: bytes.byteLength,
    };
}

const EXTENSIONS: Record<string, string> = {
    'audio/mpeg': 'mp3',
    'audio/pcm': 'pcm',
    'audio/basic': 'ulaw',
    'audio/ogg': 'ogg',
    'audio/wav': 'wav',
    'video/mp4': 'mp4',
};

/**
 * File extension used for storage keys of a given content type.
 */
export function extensionForContentType(contentType: string): string {
    const base = contentType.split(';')[0].trim().toLowerCase();
    return EXTENSIONS[base] ?? 'bin';
}
