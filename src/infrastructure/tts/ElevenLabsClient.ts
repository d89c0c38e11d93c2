import axios, { AxiosInstance } from 'axios';
import { Agent as HttpAgent } from 'http';
import { Agent as HttpsAgent } from 'https';
import { Readable } from 'stream';
import { IVoiceApiClient } from '../../domain/ports/IVoiceApiClient';
import { Voice, createVoice } from '../../domain/entities/Voice';
import {
    ApiError,
    AuthenticationError,
    NetworkError,
    RateLimitError,
    TTSAppError,
    VoiceNotFoundError,
} from '../../domain/errors';
import { getConfig } from '../../config';

/** Fixed voice settings sent with every synthesis request */
export const VOICE_SETTINGS = {
    stability: 0.5,
    similarity_boost: 0.75,
} as const;

export interface ElevenLabsClientOptions {
    /** Falls back to ELEVENLABS_API_KEY */
    apiKey?: string;
    baseUrl?: string;
    modelId?: string;
    requestTimeoutMs?: number;
    streamTimeoutMs?: number;
}

interface SynthesisPayload {
    text: string;
    model_id: string;
    voice_settings: typeof VOICE_SETTINGS;
}

/**
 * ElevenLabs API client: voice listing and streamed speech synthesis.
 *
 * Every failure leaves this class as one of the domain errors, so callers never
 * look at HTTP status codes.
 */
export class ElevenLabsClient implements IVoiceApiClient {
    private readonly client: AxiosInstance;
    private readonly httpAgent: HttpAgent;
    private readonly httpsAgent: HttpsAgent;
    private readonly modelId: string;
    private readonly streamTimeoutMs: number;
    private closed = false;

    /**
     * @throws AuthenticationError when no API key is passed or configured
     */
    constructor(options: ElevenLabsClientOptions = {}) {
        const config = getConfig();

        const apiKey = options.apiKey || config.elevenLabsApiKey;
        if (!apiKey) {
            throw new AuthenticationError(
                'ELEVENLABS_API_KEY not found. Set environment variable or pass apiKey option.'
            );
        }

        this.modelId = options.modelId || config.elevenLabsModelId;
        this.streamTimeoutMs = options.streamTimeoutMs ?? config.streamTimeoutMs;

        this.httpAgent = new HttpAgent({ keepAlive: true });
        this.httpsAgent = new HttpsAgent({ keepAlive: true });

        this.client = axios.create({
            baseURL: options.baseUrl || config.elevenLabsBaseUrl,
            timeout: options.requestTimeoutMs ?? config.requestTimeoutMs,
            headers: {
                'xi-api-key': apiKey,
            },
            httpAgent: this.httpAgent,
            httpsAgent: this.httpsAgent,
        });
    }

    /**
     * Lists voices in the order the API returns them.
     */
    async listVoices(): Promise<Voice[]> {
        this.ensureOpen();
        console.log('[ElevenLabs] Fetching voices');

        let body: string;
        try {
            const response = await this.client.get<string>('/voices', {
                headers: { Accept: 'application/json' },
                responseType: 'text',
            });
            body = response.data;
        } catch (error) {
            throw await this.translateError(error, 'fetching voices');
        }

        const voices = parseVoices(body);
        console.log(`[ElevenLabs] Retrieved ${voices.length} voices`);
        return voices;
    }

    /**
     * Streams synthesized audio chunks as they arrive from the network.
     * The response stream is destroyed whenever iteration ends, including early
     * `break` and thrown errors.
     */
    async *synthesize(
        text: string,
        voiceId: string,
        modelId: string = this.modelId
    ): AsyncGenerator<Buffer, void, undefined> {
        this.ensureOpen();
        console.log(`[ElevenLabs] Starting TTS for voice_id=${voiceId}, text length=${text.length}`);

        const payload: SynthesisPayload = {
            text,
            model_id: modelId,
            voice_settings: VOICE_SETTINGS,
        };

        let stream: Readable;
        try {
            const response = await this.client.post<Readable>(
                `/text-to-speech/${encodeURIComponent(voiceId)}`,
                payload,
                {
                    headers: { Accept: 'audio/mpeg' },
                    responseType: 'stream',
                    timeout: this.streamTimeoutMs,
                }
            );
            stream = response.data;
        } catch (error) {
            throw await this.translateError(error, 'text-to-speech', voiceId);
        }

        let totalBytes = 0;
        try {
            for await (const chunk of stream) {
                const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
                if (buffer.length === 0) continue;
                totalBytes += buffer.length;
                yield buffer;
            }
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`[ElevenLabs] Stream interrupted after ${totalBytes} bytes: ${message}`);
            throw new NetworkError(`Network error during text-to-speech: ${message}`, error);
        } finally {
            stream.destroy();
        }

        console.log(`[ElevenLabs] TTS streaming completed: ${totalBytes} bytes`);
    }

    /**
     * Destroys pooled sockets. Idempotent.
     */
    close(): void {
        if (this.closed) return;
        this.closed = true;
        this.httpAgent.destroy();
        this.httpsAgent.destroy();
    }

    private ensureOpen(): void {
        if (this.closed) {
            throw new NetworkError('Client is closed');
        }
    }

    /**
     * Maps an axios failure onto the domain error taxonomy.
     * A 404 only means "voice not found" when a voice was addressed.
     */
    private async translateError(error: unknown, operation: string, voiceId?: string): Promise<TTSAppError> {
        if (error instanceof TTSAppError) {
            return error;
        }

        if (axios.isAxiosError(error) && error.response) {
            const status = error.response.status;
            const data: unknown = error.response.data;

            if (status === 404 && voiceId !== undefined) {
                discardBody(data);
                return new VoiceNotFoundError(voiceId);
            }
            if (status === 401) {
                discardBody(data);
                return new AuthenticationError('Invalid API key', 401);
            }
            if (status === 429) {
                discardBody(data);
                return new RateLimitError();
            }

            const body = await readBody(data);
            console.error(`[ElevenLabs] API error ${status}: ${body}`);
            return ApiError.fromResponse(status, body);
        }

        const message = error instanceof Error ? error.message : String(error);
        console.error(`[ElevenLabs] Network error during ${operation}: ${message}`);
        return new NetworkError(`Network error during ${operation}: ${message}`, error);
    }
}

/**
 * Runs `fn` with a fresh client and always closes it afterwards.
 */
export async function withElevenLabsClient<T>(
    options: ElevenLabsClientOptions,
    fn: (client: ElevenLabsClient) => Promise<T>
): Promise<T> {
    const client = new ElevenLabsClient(options);
    try {
        return await fn(client);
    } finally {
        client.close();
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toLabels(value: unknown): Record<string, string> | undefined {
    if (!isRecord(value)) return undefined;
    const labels: Record<string, string> = {};
    for (const [key, entry] of Object.entries(value)) {
        if (typeof entry === 'string') {
            labels[key] = entry;
        }
    }
    return labels;
}

/**
 * Parses the `GET /voices` body. A missing `voices` array means no voices.
 */
export function parseVoices(body: string): Voice[] {
    let payload: unknown;
    try {
        payload = JSON.parse(body);
    } catch (error) {
        throw new ApiError('Malformed voices response', undefined, body, { cause: error });
    }

    if (!isRecord(payload)) {
        throw new ApiError('Malformed voices response', undefined, body);
    }

    const entries = payload.voices;
    if (entries === undefined) return [];
    if (!Array.isArray(entries)) {
        throw new ApiError('Malformed voices response', undefined, body);
    }

    return entries.map((entry: unknown) => {
        if (!isRecord(entry)) {
            throw new ApiError('Malformed voices response', undefined, body);
        }
        const { voice_id: voiceId, name, category, labels } = entry;
        if (typeof voiceId !== 'string' || typeof name !== 'string') {
            throw new ApiError('Malformed voices response', undefined, body);
        }
        return createVoice({
            voiceId,
            name,
            category: typeof category === 'string' ? category : undefined,
            labels: toLabels(labels),
        });
    });
}

async function readBody(data: unknown): Promise<string> {
    if (data instanceof Readable) {
        const chunks: Buffer[] = [];
        try {
            for await (const chunk of data) {
                chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
            }
        } catch (error) {
            console.warn('[ElevenLabs] Could not read error body:', error instanceof Error ? error.message : error);
        }
        return Buffer.concat(chunks).toString('utf-8');
    }
    if (typeof data === 'string') return data;
    if (Buffer.isBuffer(data)) return data.toString('utf-8');
    if (data === undefined || data === null) return '';
    return JSON.stringify(data);
}

function discardBody(data: unknown): void {
    if (data instanceof Readable) {
        data.destroy();
    }
}
