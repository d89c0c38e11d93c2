import { ValidationError } from '../errors';

/**
 * A single text-to-speech conversion: what to say, with which voice, and where
 * to write the audio.
 */
export interface TTSRequest {
    readonly text: string;
    /** Checked for non-emptiness only; the API decides whether the voice exists */
    readonly voiceId: string;
    readonly outputPath: string;
}

/**
 * Creates a TTSRequest, rejecting blank fields.
 */
export function createTTSRequest(params: {
    text: string;
    voiceId: string;
    outputPath: string;
}): TTSRequest {
    if (!params.text.trim()) {
        throw new ValidationError('Text cannot be empty');
    }
    if (!params.voiceId.trim()) {
        throw new ValidationError('Voice ID cannot be empty');
    }
    if (!params.outputPath.trim()) {
        throw new ValidationError('Output path cannot be empty');
    }

    return Object.freeze({
        text: params.text,
        voiceId: params.voiceId,
        outputPath: params.outputPath,
    });
}
