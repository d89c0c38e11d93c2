import fs from 'fs';
import os from 'os';
import path from 'path';
import { TTSService } from '../../../src/application/TTSService';
import { IVoiceApiClient } from '../../../src/domain/ports/IVoiceApiClient';
import { Voice, createVoice } from '../../../src/domain/entities/Voice';
import { createTTSRequest } from '../../../src/domain/entities/TTSRequest';
import {
    FileSystemError,
    NetworkError,
    RateLimitError,
    VoiceNotFoundError,
} from '../../../src/domain/errors';

async function* audioChunks(...parts: string[]): AsyncGenerator<Buffer, void, undefined> {
    for (const part of parts) {
        yield Buffer.from(part);
    }
}

function createMockClient() {
    return {
        listVoices: jest.fn<Promise<Voice[]>, []>(),
        synthesize: jest.fn<AsyncGenerator<Buffer, void, undefined>, [string, string, string?]>(),
        close: jest.fn<void, []>(),
    } satisfies IVoiceApiClient;
}

describe('TTSService', () => {
    let mockClient: ReturnType<typeof createMockClient>;
    let service: TTSService;

    const sampleVoices: Voice[] = [
        createVoice({ voiceId: 'voice-3', name: 'Charlie', category: 'premade' }),
        createVoice({ voiceId: 'voice-1', name: 'Alice', category: 'premade' }),
        createVoice({ voiceId: 'voice-2', name: 'Bob', category: 'cloned' }),
    ];

    beforeEach(() => {
        mockClient = createMockClient();
        service = new TTSService(mockClient);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('listVoices', () => {
        it('should return voices sorted alphabetically by name', async () => {
            mockClient.listVoices.mockResolvedValueOnce(sampleVoices);

            const result = await service.listVoices();

            expect(result.map((v) => v.name)).toEqual(['Alice', 'Bob', 'Charlie']);
            expect(mockClient.listVoices).toHaveBeenCalledTimes(1);
        });

        it('should sort case-insensitively and keep the API order for equal names', async () => {
            mockClient.listVoices.mockResolvedValueOnce([
                createVoice({ voiceId: 'b', name: 'beta' }),
                createVoice({ voiceId: 'a1', name: 'Alpha' }),
                createVoice({ voiceId: 'a2', name: 'alpha' }),
            ]);

            const result = await service.listVoices();

            expect(result.map((v) => v.voiceId)).toEqual(['a1', 'a2', 'b']);
        });

        it('should not reorder the list returned by the client', async () => {
            const fromApi = [...sampleVoices];
            mockClient.listVoices.mockResolvedValueOnce(fromApi);

            await service.listVoices();

            expect(fromApi.map((v) => v.name)).toEqual(['Charlie', 'Alice', 'Bob']);
        });

        it('should handle an empty list', async () => {
            mockClient.listVoices.mockResolvedValueOnce([]);

            await expect(service.listVoices()).resolves.toEqual([]);
        });

        it('should propagate client errors unchanged', async () => {
            const error = new RateLimitError();
            mockClient.listVoices.mockRejectedValueOnce(error);

            await expect(service.listVoices()).rejects.toBe(error);
        });
    });

    describe('searchVoices', () => {
        it('should match names case-insensitively', () => {
            const result = service.searchVoices('OB', sampleVoices);

            expect(result.map((v) => v.name)).toEqual(['Bob']);
        });

        it('should match voice ids', () => {
            const result = service.searchVoices('voice-2', sampleVoices);

            expect(result.map((v) => v.name)).toEqual(['Bob']);
        });

        it('should match by substring in input order', () => {
            const result = service.searchVoices('voice', sampleVoices);

            expect(result.map((v) => v.name)).toEqual(['Charlie', 'Alice', 'Bob']);
        });

        it('should trim the query', () => {
            const result = service.searchVoices('  alice  ', sampleVoices);

            expect(result.map((v) => v.name)).toEqual(['Alice']);
        });

        it('should return the input list for an empty query', () => {
            expect(service.searchVoices('', sampleVoices)).toBe(sampleVoices);
            expect(service.searchVoices('   ', sampleVoices)).toBe(sampleVoices);
        });

        it('should return an empty list when nothing matches', () => {
            expect(service.searchVoices('zzz', sampleVoices)).toEqual([]);
        });

        it('should never call the API', () => {
            service.searchVoices('alice', sampleVoices);

            expect(mockClient.listVoices).not.toHaveBeenCalled();
            expect(mockClient.synthesize).not.toHaveBeenCalled();
        });
    });

    describe('generateAudio', () => {
        let tmpDir: string;

        beforeEach(() => {
            tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tts-service-'));
        });

        afterEach(() => {
            fs.rmSync(tmpDir, { recursive: true, force: true });
        });

        it('should write every chunk to the output file in order', async () => {
            const outputPath = path.join(tmpDir, 'output.mp3');
            mockClient.synthesize.mockReturnValueOnce(audioChunks('chunk1', 'chunk2', 'chunk3'));

            await service.generateAudio(createTTSRequest({ text: 'Hello world', voiceId: 'voice-1', outputPath }));

            expect(fs.readFileSync(outputPath, 'utf-8')).toBe('chunk1chunk2chunk3');
            expect(mockClient.synthesize).toHaveBeenCalledWith('Hello world', 'voice-1');
        });

        it('should truncate an existing file', async () => {
            const outputPath = path.join(tmpDir, 'existing.mp3');
            fs.writeFileSync(outputPath, 'previous audio that was much longer');
            mockClient.synthesize.mockReturnValueOnce(audioChunks('new'));

            await service.generateAudio(createTTSRequest({ text: 'Hi', voiceId: 'voice-1', outputPath }));

            expect(fs.readFileSync(outputPath, 'utf-8')).toBe('new');
        });

        it('should create an empty file when the stream yields nothing', async () => {
            const outputPath = path.join(tmpDir, 'empty.mp3');
            mockClient.synthesize.mockReturnValueOnce(audioChunks());

            await service.generateAudio(createTTSRequest({ text: 'Hi', voiceId: 'voice-1', outputPath }));

            expect(fs.readFileSync(outputPath).length).toBe(0);
        });

        it('should fail before calling the API when the directory is missing', async () => {
            const missingDir = path.join(tmpDir, 'missing');
            const outputPath = path.join(missingDir, 'output.mp3');

            await expect(
                service.generateAudio(createTTSRequest({ text: 'Hi', voiceId: 'voice-1', outputPath }))
            ).rejects.toThrow(new FileSystemError(`Output directory does not exist: ${missingDir}`));

            expect(mockClient.synthesize).toHaveBeenCalledTimes(0);
            expect(fs.existsSync(missingDir)).toBe(false);
        });

        it('should fail before calling the API when the output path is a directory', async () => {
            const outputPath = path.join(tmpDir, 'a-directory');
            fs.mkdirSync(outputPath);

            const attempt = service.generateAudio(createTTSRequest({ text: 'Hi', voiceId: 'voice-1', outputPath }));

            await expect(attempt).rejects.toBeInstanceOf(FileSystemError);
            await expect(attempt).rejects.toThrow('not a file');
            expect(mockClient.synthesize).not.toHaveBeenCalled();
        });

        it('should propagate API errors unchanged', async () => {
            const outputPath = path.join(tmpDir, 'output.mp3');
            const error = new VoiceNotFoundError('voice-x');
            mockClient.synthesize.mockImplementationOnce(async function* failing() {
                throw error;
            });

            await expect(
                service.generateAudio(createTTSRequest({ text: 'Hi', voiceId: 'voice-x', outputPath }))
            ).rejects.toBe(error);
        });

        it('should keep the bytes written before a mid-stream failure', async () => {
            const outputPath = path.join(tmpDir, 'partial.mp3');
            const error = new NetworkError('Network error during text-to-speech: aborted');
            mockClient.synthesize.mockImplementationOnce(async function* interrupted() {
                yield Buffer.from('part1');
                throw error;
            });

            await expect(
                service.generateAudio(createTTSRequest({ text: 'Hi', voiceId: 'voice-1', outputPath }))
            ).rejects.toBe(error);

            expect(fs.readFileSync(outputPath, 'utf-8')).toBe('part1');
        });

        it('should wrap file errors in FileSystemError', async () => {
            const outputPath = path.join(tmpDir, 'output.mp3');
            const ioError = Object.assign(new Error('EIO: i/o error'), { code: 'EIO' });
            jest.spyOn(fs.promises, 'open').mockRejectedValueOnce(ioError);

            const attempt = service.generateAudio(createTTSRequest({ text: 'Hi', voiceId: 'voice-1', outputPath }));

            await expect(attempt).rejects.toBeInstanceOf(FileSystemError);
            await expect(attempt).rejects.toThrow('Error writing audio file: EIO: i/o error');
            await expect(attempt).rejects.toHaveProperty('cause', ioError);
            expect(mockClient.synthesize).not.toHaveBeenCalled();
        });

        it('should recognise a missing directory from an errno object that is not an Error', async () => {
            const outputPath = path.join(tmpDir, 'missing', 'output.mp3');
            jest.spyOn(fs.promises, 'stat').mockRejectedValue({ code: 'ENOENT', message: 'ENOENT: no such file or directory' });

            await expect(
                service.generateAudio(createTTSRequest({ text: 'Hi', voiceId: 'voice-1', outputPath }))
            ).rejects.toThrow(`Output directory does not exist: ${path.join(tmpDir, 'missing')}`);
            expect(mockClient.synthesize).not.toHaveBeenCalled();
        });

        it('should report other stat failures as uninspectable paths', async () => {
            const outputPath = path.join(tmpDir, 'output.mp3');
            jest.spyOn(fs.promises, 'stat').mockRejectedValue({ code: 'EACCES', message: 'EACCES: permission denied' });

            const attempt = service.generateAudio(createTTSRequest({ text: 'Hi', voiceId: 'voice-1', outputPath }));

            await expect(attempt).rejects.toBeInstanceOf(FileSystemError);
            await expect(attempt).rejects.toThrow(`Cannot inspect output path: ${tmpDir}`);
        });

        it('should use the message of a non-Error write failure', async () => {
            const outputPath = path.join(tmpDir, 'output.mp3');
            jest.spyOn(fs.promises, 'open').mockRejectedValueOnce({ code: 'ENOSPC', message: 'ENOSPC: no space left on device' });

            await expect(
                service.generateAudio(createTTSRequest({ text: 'Hi', voiceId: 'voice-1', outputPath }))
            ).rejects.toThrow('Error writing audio file: ENOSPC: no space left on device');
        });
    });
});
