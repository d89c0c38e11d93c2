import fs, { Stats } from 'fs';
import { FileHandle } from 'fs/promises';
import path from 'path';
import { IVoiceApiClient } from '../domain/ports/IVoiceApiClient';
import { Voice } from '../domain/entities/Voice';
import { TTSRequest } from '../domain/entities/TTSRequest';
import { FileSystemError, TTSAppError } from '../domain/errors';

/**
 * TTSService orchestrates voice listing, searching and audio generation.
 * It knows nothing about HTTP; the client port reports failures as domain errors.
 */
export class TTSService {
    constructor(private readonly apiClient: IVoiceApiClient) { }

    /**
     * Lists voices sorted by name, case-insensitive. Equal names keep API order.
     */
    async listVoices(): Promise<Voice[]> {
        console.log('[TTSService] Listing available voices');
        const voices = await this.apiClient.listVoices();

        return [...voices].sort((a, b) => compareNames(a.name, b.name));
    }

    /**
     * Filters voices whose name or ID contains the query (case-insensitive).
     * A blank query returns the input list as-is.
     */
    searchVoices(query: string, voices: Voice[]): Voice[] {
        const needle = query.toLowerCase().trim();
        if (!needle) {
            return voices;
        }

        return voices.filter(
            (voice) => voice.name.toLowerCase().includes(needle) || voice.voiceId.toLowerCase().includes(needle)
        );
    }

    /**
     * Synthesizes the request and writes the audio to `outputPath` chunk by chunk.
     *
     * Filesystem preconditions are checked before the API is called. The output
     * directory is never created.
     */
    async generateAudio(request: TTSRequest): Promise<void> {
        console.log(
            `[TTSService] Generating audio: voice=${request.voiceId}, ` +
            `text_length=${request.text.length}, output=${request.outputPath}`
        );

        const outputPath = request.outputPath;
        const outputDir = path.dirname(outputPath);

        if (!(await pathExists(outputDir))) {
            throw new FileSystemError(`Output directory does not exist: ${outputDir}`);
        }

        const existing = await statOrNull(outputPath);
        if (existing && !existing.isFile()) {
            throw new FileSystemError(`Output path exists but is not a file: ${outputPath}`);
        }

        let handle: FileHandle | undefined;
        let bytesWritten = 0;
        try {
            handle = await fs.promises.open(outputPath, 'w');

            for await (const chunk of this.apiClient.synthesize(request.text, request.voiceId)) {
                await handle.write(chunk);
                bytesWritten += chunk.length;
            }

            await handle.close();
            handle = undefined;
        } catch (error) {
            if (error instanceof TTSAppError) {
                throw error;
            }
            const message = describeError(error);
            console.error(`[TTSService] File system error: ${message}`);
            throw new FileSystemError(`Error writing audio file: ${message}`, error);
        } finally {
            if (handle) {
                await closeQuietly(handle);
            }
        }

        console.log(`[TTSService] Audio saved: ${outputPath} (${bytesWritten} bytes)`);
    }
}

function compareNames(a: string, b: string): number {
    const left = a.toLowerCase();
    const right = b.toLowerCase();
    if (left < right) return -1;
    if (left > right) return 1;
    return 0;
}

async function statOrNull(target: string): Promise<Stats | null> {
    try {
        return await fs.promises.stat(target);
    } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
            return null;
        }
        throw new FileSystemError(`Cannot inspect output path: ${target}`, error);
    }
}

async function pathExists(target: string): Promise<boolean> {
    return (await statOrNull(target)) !== null;
}

// fs errors may come from another realm (e.g. a test sandbox), so no instanceof Error
function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return typeof error === 'object' && error !== null && 'code' in error;
}

function describeError(error: unknown): string {
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
        return error.message;
    }
    return String(error);
}

/**
 * Closes a handle left open by a failed write; the original failure wins.
 */
async function closeQuietly(handle: FileHandle): Promise<void> {
    try {
        await handle.close();
    } catch (error) {
        console.warn(`[TTSService] Failed to close output file: ${describeError(error)}`);
    }
}
