import {
    GenerationRequestInput,
    createGenerationRequest,
    createSpeechTrackRequest,
    getSpeechInput,
    wantsSpeech,
} from '../../../src/domain/entities/GenerationRequest';
import { ValidationRejectedError } from '../../../src/domain/errors/GenerationErrors';

describe('createGenerationRequest', () => {
    const base: GenerationRequestInput = {
        imageUrl: ' https://img.example/cat.png ',
        prompt: ' a cat waves ',
        seconds: 6,
        resolution: '768p',
        modelId: 'minimax/hailuo-02',
    };

    it('trims and freezes the request', () => {
        const request = createGenerationRequest(base);

        expect(request.imageUrl).toBe('https://img.example/cat.png');
        expect(request.prompt).toBe('a cat waves');
        expect(Object.isFrozen(request)).toBe(true);
        expect(wantsSpeech(request)).toBe(false);
        expect(getSpeechInput(request)).toBeNull();
    });

    it('keeps a complete speech pair', () => {
        const request = createGenerationRequest({ ...base, speechText: 'Hello there', voiceId: 'voice-1' });

        expect(getSpeechInput(request)).toEqual({ text: 'Hello there', voiceId: 'voice-1' });
        expect(wantsSpeech(request)).toBe(true);
    });

    it('treats blank speech fields as absent', () => {
        const request = createGenerationRequest({ ...base, speechText: '  ', voiceId: '' });
        expect(wantsSpeech(request)).toBe(false);
        expect(request.speechText).toBeUndefined();
    });

    it('rejects text without a voice', () => {
        expect(() => createGenerationRequest({ ...base, speechText: 'Hello' }))
            .toThrow('voice_id is required when speech text is provided');
    });

    it('rejects a voice without text', () => {
        expect(() => createGenerationRequest({ ...base, voiceId: 'voice-1' }))
            .toThrow('speech text is required when voice_id is provided');
    });

    it('rejects a blank image url or prompt', () => {
        expect(() => createGenerationRequest({ ...base, imageUrl: ' ' })).toThrow(ValidationRejectedError);
        expect(() => createGenerationRequest({ ...base, prompt: '' })).toThrow('prompt is required');
    });

    it('rejects negative or fractional seconds', () => {
        expect(() => createGenerationRequest({ ...base, seconds: -1 }))
            .toThrow('seconds must be a non-negative integer, got: -1');
        expect(() => createGenerationRequest({ ...base, seconds: 2.5 })).toThrow(ValidationRejectedError);
    });

    it('copies the user context', () => {
        const userContext = { id: '6f1c2a0e-8d4b-4c7a-9e15-3b2d1f0a9c88' };
        const request = createGenerationRequest({ ...base, userContext });
        userContext.id = 'changed';

        expect(request.userContext?.id).toBe('6f1c2a0e-8d4b-4c7a-9e15-3b2d1f0a9c88');
    });
});

describe('createSpeechTrackRequest', () => {
    it('trims and freezes the request', () => {
        const request = createSpeechTrackRequest({
            imageUrl: ' https://img.example/cat.png ',
            audioUrl: ' https://cdn.example/hello.mp3 ',
        });

        expect(request).toEqual({ imageUrl: 'https://img.example/cat.png', audioUrl: 'https://cdn.example/hello.mp3' });
        expect(Object.isFrozen(request)).toBe(true);
    });

    it('requires an audio URL', () => {
        expect(() => createSpeechTrackRequest({ imageUrl: 'https://img.example/cat.png', audioUrl: ' ' }))
            .toThrow('audio_url is required');
    });
});
