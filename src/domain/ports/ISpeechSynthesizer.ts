import { SpeechArtifact } from '../entities/Artifacts';

/**
 * ISpeechSynthesizer - Port for text-to-speech providers.
 * Implementations: ElevenLabsSpeechSynthesizer
 */
export interface ISpeechSynthesizer {
    /**
     * Synthesizes speech for the given script.
     * Rejects over-long text before contacting the provider and over-sized output after.
     * @param outputFormat Provider output format, e.g. "mp3_44100_64"
     */
    synthesize(text: string, voiceId: string, outputFormat?: string): Promise<SpeechArtifact>;
}
