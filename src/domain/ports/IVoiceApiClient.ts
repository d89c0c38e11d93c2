import { Voice } from '../entities/Voice';

/**
 * IVoiceApiClient - Port for the remote voice synthesis API.
 * Implementations: ElevenLabsClient
 */
export interface IVoiceApiClient {
    /**
     * Lists available voices in the order the API returns them.
     */
    listVoices(): Promise<Voice[]>;

    /**
     * Streams synthesized audio for the given text.
     * The generator can be consumed once; stopping early releases the connection.
     * @param modelId Synthesis model, defaults to the configured model
     */
    synthesize(text: string, voiceId: string, modelId?: string): AsyncGenerator<Buffer, void, undefined>;

    /**
     * Releases pooled connections. Safe to call more than once.
     */
    close(): void;
}
