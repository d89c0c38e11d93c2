import path from 'path';
import { Command, CommanderError } from 'commander';
import { TTSService } from '../../application/TTSService';
import { IVoiceApiClient } from '../../domain/ports/IVoiceApiClient';
import { TTSRequest, createTTSRequest } from '../../domain/entities/TTSRequest';
import {
    AuthenticationError,
    NetworkError,
    RateLimitError,
    TTSAppError,
    ValidationError,
    isRetriable,
} from '../../domain/errors';
import { Print, Prompter } from './Prompter';
import { selectVoiceInteractive } from './VoicePicker';

interface CliOptions {
    text?: string;
    voiceId?: string;
    output?: string;
}

export interface CliDependencies {
    /** May throw AuthenticationError when no API key is configured */
    createClient: () => IVoiceApiClient;
    createService?: (client: IVoiceApiClient) => TTSService;
    prompter: Prompter;
    print: Print;
    cwd: () => string;
}

function buildProgram(print: Print): Command {
    return new Command()
        .name('tts-cli')
        .description('ElevenLabs Text-to-Speech CLI - Convert text to audio using ElevenLabs API')
        .option('-t, --text <text>', 'Text to convert to speech (if not provided, will ask interactively)')
        .option('-v, --voice-id <voiceId>', 'ElevenLabs voice ID (if not provided, will ask interactively)')
        .option('-o, --output <file>', 'Output filename (if not provided, will ask interactively)')
        .exitOverride()
        .configureOutput({
            writeOut: (str) => print(str.trimEnd()),
            writeErr: (str) => print(str.trimEnd()),
        });
}

/**
 * Runs the CLI against user arguments (without the node/script prefix).
 * Missing options are collected interactively.
 * @returns the process exit code
 */
export async function runCli(argv: string[], deps: CliDependencies): Promise<number> {
    const { prompter, print } = deps;
    const program = buildProgram(print);

    try {
        program.parse(argv, { from: 'user' });
    } catch (error) {
        if (error instanceof CommanderError) {
            return error.exitCode;
        }
        throw error;
    }
    const options = program.opts<CliOptions>();

    print('ElevenLabs TTS CLI');

    let client: IVoiceApiClient;
    try {
        client = deps.createClient();
    } catch (error) {
        if (error instanceof AuthenticationError) {
            print(`Error: ${error.message}`);
            print('Please set ELEVENLABS_API_KEY environment variable:');
            print("  export ELEVENLABS_API_KEY='your-api-key-here'");
            return 1;
        }
        throw error;
    }

    try {
        const service = deps.createService ? deps.createService(client) : new TTSService(client);

        let voiceId = options.voiceId;
        if (!voiceId) {
            voiceId = (await selectVoiceInteractive(service, prompter, print)) ?? undefined;
            if (!voiceId) {
                print('Voice selection cancelled.');
                return 0;
            }
        }

        let text = options.text;
        if (!text) {
            text = (await askText(prompter, print)) ?? undefined;
            if (!text) {
                print('Text input cancelled.');
                return 0;
            }
        }

        let output = options.output;
        if (!output) {
            output = (await askOutputFilename(prompter, print, deps.cwd())) ?? undefined;
            if (!output) {
                print('Output filename cancelled.');
                return 0;
            }
        }

        let request: TTSRequest;
        try {
            request = createTTSRequest({ text, voiceId, outputPath: output });
        } catch (error) {
            if (error instanceof ValidationError) {
                print(`Validation Error: ${error.message}`);
                return 1;
            }
            throw error;
        }

        if (await executeWithRetry(service, request, prompter, print)) {
            print('✓ Done!');
            return 0;
        }
        print('✗ Failed.');
        return 1;
    } finally {
        client.close();
    }
}

async function askText(prompter: Prompter, print: Print): Promise<string | null> {
    print('Enter the text to convert to speech:');
    const answer = await prompter.ask('> ');
    if (answer === null) {
        print('Cancelled.');
        return null;
    }
    const text = answer.trim();
    if (!text) {
        print('Text cannot be empty.');
        return null;
    }
    return text;
}

/**
 * Asks for a filename, appends ".mp3" when missing and resolves it against `cwd`.
 */
export async function askOutputFilename(prompter: Prompter, print: Print, cwd: string): Promise<string | null> {
    print("Enter output filename (e.g. 'output.mp3' - saved in the current directory):");
    const answer = await prompter.ask('> ');
    if (answer === null) {
        print('Cancelled.');
        return null;
    }
    let filename = answer.trim();
    if (!filename) {
        print('Filename cannot be empty.');
        return null;
    }
    if (!filename.toLowerCase().endsWith('.mp3')) {
        filename += '.mp3';
    }
    return path.resolve(cwd, filename);
}

function errorLabel(error: TTSAppError): string {
    if (error instanceof RateLimitError) return 'Rate Limit Error';
    if (error instanceof NetworkError) return 'Network Error';
    return 'Error';
}

/**
 * Generates audio, offering another attempt after retriable failures.
 * @returns true once the audio is saved
 */
export async function executeWithRetry(
    service: TTSService,
    request: TTSRequest,
    prompter: Prompter,
    print: Print
): Promise<boolean> {
    for (;;) {
        try {
            print('Generating audio...');
            await service.generateAudio(request);
            print(`✓ Audio saved to: ${request.outputPath}`);
            return true;
        } catch (error) {
            if (error instanceof AuthenticationError) {
                print(`Authentication Error: ${error.message}`);
                print('Please check your ELEVENLABS_API_KEY');
                return false;
            }
            if (!(error instanceof TTSAppError)) {
                throw error;
            }

            print(`${errorLabel(error)}: ${error.message}`);
            if (!isRetriable(error)) {
                return false;
            }

            const answer = await prompter.ask('Do you want to retry? (y/n): ');
            const choice = answer?.trim().toLowerCase();
            if (choice !== 'y' && choice !== 'yes') {
                return false;
            }
        }
    }
}
